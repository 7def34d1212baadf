import { SetMetadata } from "@nestjs/common";

export const SKIP_RATE_LIMIT_KEY = "skipRateLimit";

/**
 * Exempt a route or controller from request admission control
 */
export const SkipRateLimit = () => SetMetadata(SKIP_RATE_LIMIT_KEY, true);
