/**
 * Client Identification Utilities
 * Derives the rate-limit identity of a request from its source address
 */

import type {
  ClientAddressSource,
  ClientIdentificationOptions,
  ClientInfo,
  IdentifiableRequest,
} from "../types/http/client.types";

export class ClientIdentificationUtils {
  /**
   * Resolve the client address: first X-Forwarded-For entry, then X-Real-IP,
   * then the socket peer. Forwarded headers are only read when trusted.
   */
  static getClientInfo(request: IdentifiableRequest, options: ClientIdentificationOptions = {}): ClientInfo {
    const trustProxyHeaders = options.trustProxyHeaders ?? true;

    if (trustProxyHeaders) {
      const forwardedFor = this.headerValue(request, "x-forwarded-for")?.split(",")[0]?.trim();
      if (forwardedFor) {
        return this.toClientInfo(forwardedFor, "x-forwarded-for");
      }

      const realIp = this.headerValue(request, "x-real-ip")?.trim();
      if (realIp) {
        return this.toClientInfo(realIp, "x-real-ip");
      }
    }

    const socketAddress = request.socket?.remoteAddress || request.ip;
    if (socketAddress) {
      return this.toClientInfo(socketAddress, "socket");
    }

    return this.toClientInfo("unknown", "unknown");
  }

  /**
   * Sanitize user agent string for logging
   */
  static sanitizeUserAgent(userAgent: string | undefined): string {
    if (!userAgent) {
      return "unknown";
    }
    // Truncate very long user agent strings
    return userAgent.length > 100 ? `${userAgent.substring(0, 100)}...` : userAgent;
  }

  private static headerValue(request: IdentifiableRequest, name: string): string | undefined {
    const value = request.headers[name];
    return Array.isArray(value) ? value[0] : value;
  }

  private static toClientInfo(ip: string, source: ClientAddressSource): ClientInfo {
    // IPv4-mapped IPv6 peers and plain IPv4 peers are the same client
    const normalized = ip.startsWith("::ffff:") ? ip.substring(7) : ip;
    return { id: `ip:${normalized}`, ip: normalized, source };
  }
}
