import { isPlainObject } from "@/common/utils/common.utils";

/**
 * Read the `exp` claim (epoch ms) from a JWT without verifying it
 */
export function decodeJwtExpiry(token: string): number | undefined {
  const segments = token.split(".");
  if (segments.length !== 3) {
    return undefined;
  }

  try {
    const claims: unknown = JSON.parse(Buffer.from(segments[1], "base64url").toString("utf8"));
    return isPlainObject(claims) && typeof claims.exp === "number" ? claims.exp * 1000 : undefined;
  } catch {
    return undefined;
  }
}
