import type {
  AttributePayload,
  AttributeScope,
  UploadAck,
  UploadOptions,
  UploadResult,
  UpstreamFailure,
  UpstreamTelemetryClient,
} from "@/upstream/upstream.types";
import type { TelemetryPayload } from "@/telemetry/telemetry.types";

export type FakeUploadBehavior =
  | { type: "success"; delayMs?: number }
  | { type: "failure"; failure: UpstreamFailure; delayMs?: number }
  | { type: "throw"; error: Error; delayMs?: number }
  | { type: "hang" };

export interface RecordedUpload {
  targetId: string;
  payload: TelemetryPayload;
}

export interface RecordedAttributeUpload {
  targetId: string;
  scope: AttributeScope;
  attributes: AttributePayload;
}

/**
 * In-process stand-in for the telemetry platform with scripted per-device behavior
 */
export class FakeUpstreamTelemetryClient implements UpstreamTelemetryClient {
  readonly calls: RecordedUpload[] = [];
  readonly attributeCalls: RecordedAttributeUpload[] = [];
  readonly aborted: string[] = [];
  readonly completionOrder: string[] = [];
  private readonly behaviors = new Map<string, FakeUploadBehavior>();
  private secrets: string[] = [];

  constructor(private defaultBehavior: FakeUploadBehavior = { type: "success" }) {}

  respondTo(targetId: string, behavior: FakeUploadBehavior): this {
    this.behaviors.set(targetId, behavior);
    return this;
  }

  respondToAll(behavior: FakeUploadBehavior): this {
    this.defaultBehavior = behavior;
    return this;
  }

  holdSecrets(...secrets: string[]): this {
    this.secrets = secrets;
    return this;
  }

  async upload(targetId: string, payload: TelemetryPayload, options: UploadOptions = {}): Promise<UploadResult> {
    this.calls.push({ targetId, payload });
    return this.respond(targetId, options.signal, {
      acceptedKeys: Object.keys(payload),
      acceptedCount: this.countSamples(payload),
    });
  }

  async uploadAttributes(
    targetId: string,
    scope: AttributeScope,
    attributes: AttributePayload,
    options: UploadOptions = {}
  ): Promise<UploadResult> {
    this.attributeCalls.push({ targetId, scope, attributes });
    const keys = Object.keys(attributes);
    return this.respond(targetId, options.signal, { acceptedKeys: keys, acceptedCount: keys.length });
  }

  activeSecrets(): string[] {
    return [...this.secrets];
  }

  private async respond(targetId: string, signal: AbortSignal | undefined, ack: UploadAck): Promise<UploadResult> {
    const behavior = this.behaviors.get(targetId) ?? this.defaultBehavior;

    if (behavior.type === "hang") {
      await this.pause(undefined, targetId, signal);
      throw new Error("unreachable");
    }

    if (behavior.delayMs) {
      await this.pause(behavior.delayMs, targetId, signal);
    }
    this.completionOrder.push(targetId);

    switch (behavior.type) {
      case "success":
        return { ok: true, ack };
      case "failure":
        return { ok: false, failure: behavior.failure };
      case "throw":
        throw behavior.error;
    }
  }

  private pause(ms: number | undefined, targetId: string, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        this.aborted.push(targetId);
        reject(signal?.reason);
      };
      const timer =
        ms === undefined
          ? undefined
          : setTimeout(() => {
              signal?.removeEventListener("abort", onAbort);
              resolve();
            }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private countSamples(payload: TelemetryPayload): number {
    return Object.values(payload).reduce((total, samples) => total + samples.length, 0);
  }
}

/**
 * Factory for commonly used test fixtures
 */
export class MockFactory {
  static createUpstreamClient(defaultBehavior?: FakeUploadBehavior): FakeUpstreamTelemetryClient {
    return new FakeUpstreamTelemetryClient(defaultBehavior);
  }

  static createPayload(keys: string[] = ["temperature"], samplesPerKey: number = 1): Record<string, unknown> {
    const payload: Record<string, unknown> = {};
    for (const key of keys) {
      payload[key] = Array.from({ length: samplesPerKey }, (_, i) => ({ ts: 1767225600000 + i * 1000, value: 20 + i }));
    }
    return payload;
  }
}
