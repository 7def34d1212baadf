/**
 * Client identification type definitions
 */

export type ClientAddressSource = "x-forwarded-for" | "x-real-ip" | "socket" | "unknown";

export interface ClientInfo {
  /** Rate-limit identity key */
  id: string;
  ip: string;
  source: ClientAddressSource;
}

export interface IdentifiableRequest {
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
  socket?: { remoteAddress?: string };
}

export interface ClientIdentificationOptions {
  /** Honor X-Forwarded-For / X-Real-IP; only safe behind a trusted proxy */
  trustProxyHeaders?: boolean;
}
