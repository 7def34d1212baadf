import { FakeUpstreamTelemetryClient, MockFactory } from "@/__tests__/utils/mock.factories";
import { ApiException } from "@/common/errors/api-exception";
import { TelemetryService } from "../telemetry.service";

describe("TelemetryService", () => {
  let upstream: FakeUpstreamTelemetryClient;
  let service: TelemetryService;

  beforeEach(() => {
    upstream = MockFactory.createUpstreamClient();
    service = new TelemetryService(upstream, { perTargetTimeoutMs: 50, maxConcurrency: 4, maxTargets: 100 });
  });

  it("should upload a valid payload and count its data points", async () => {
    const result = await service.uploadDeviceTelemetry("device-1", MockFactory.createPayload(["temperature", "humidity"], 3));

    expect(result).toEqual({ deviceId: "device-1", keys: ["temperature", "humidity"], dataPoints: 6 });
    expect(upstream.calls).toHaveLength(1);
  });

  it("should forward samples reduced to ts and value", async () => {
    await service.uploadDeviceTelemetry("device-1", {
      temperature: [{ ts: 1767225600000, value: 21.5, unit: "C" }],
    });

    expect(upstream.calls[0]).toEqual({
      targetId: "device-1",
      payload: { temperature: [{ ts: 1767225600000, value: 21.5 }] },
    });
  });

  it("should forward every key it reports as uploaded, including __proto__", async () => {
    const payload: unknown = JSON.parse('{"__proto__":[{"ts":1,"value":5}],"temp":[{"ts":1,"value":1}]}');

    const result = await service.uploadDeviceTelemetry("device-1", payload);

    expect(result).toEqual({ deviceId: "device-1", keys: ["__proto__", "temp"], dataPoints: 2 });
    expect(Object.keys(upstream.calls[0].payload)).toEqual(["__proto__", "temp"]);
    expect(JSON.stringify(upstream.calls[0].payload)).toBe(
      '{"__proto__":[{"ts":1,"value":5}],"temp":[{"ts":1,"value":1}]}'
    );
  });

  it("should reject an invalid payload without calling upstream", async () => {
    const upload = service.uploadDeviceTelemetry("device-1", { temperature: [{ ts: 1.5, value: 20 }] });

    await expect(upload).rejects.toBeInstanceOf(ApiException);
    await expect(upload).rejects.toMatchObject({
      errorCause: {
        kind: "validation",
        message: "Invalid telemetry payload: temperature[0].ts",
        fieldErrors: [
          { field: "temperature[0].ts", constraints: ["ts must be an integer epoch timestamp in milliseconds"] },
        ],
      },
    });
    expect(upstream.calls).toHaveLength(0);
  });

  it("should map an upstream 404 to not found", async () => {
    upstream.respondToAll({ type: "failure", failure: { statusCode: 404, message: "Upstream responded with status 404" } });

    await expect(service.uploadDeviceTelemetry("device-9", MockFactory.createPayload())).rejects.toMatchObject({
      errorCause: { kind: "not_found", message: "Device device-9 not found" },
    });
  });

  it("should map other upstream failures to an upstream error", async () => {
    upstream.respondToAll({
      type: "failure",
      failure: { statusCode: 503, message: "Upstream responded with status 503", body: "maintenance" },
    });

    await expect(service.uploadDeviceTelemetry("device-1", MockFactory.createPayload())).rejects.toMatchObject({
      errorCause: {
        kind: "upstream",
        message: "Upstream responded with status 503",
        statusCode: 503,
        upstreamMessage: "maintenance",
      },
    });
  });

  it("should time out an upload that never settles", async () => {
    upstream.respondToAll({ type: "hang" });

    await expect(service.uploadDeviceTelemetry("device-1", MockFactory.createPayload())).rejects.toMatchObject({
      errorCause: { kind: "upstream", message: "Upload timed out after 50ms", timedOut: true },
    });
    expect(upstream.aborted).toEqual(["device-1"]);
  });

  it("should wrap errors thrown by the client", async () => {
    upstream.respondToAll({ type: "throw", error: new Error("socket hang up") });

    await expect(service.uploadDeviceTelemetry("device-1", MockFactory.createPayload())).rejects.toMatchObject({
      errorCause: { kind: "upstream", message: "socket hang up" },
    });
  });

  it("should propagate the caller's abort reason", async () => {
    upstream.respondToAll({ type: "hang" });
    const controller = new AbortController();
    const reason = new Error("client disconnected");

    const upload = service.uploadDeviceTelemetry("device-1", MockFactory.createPayload(), { signal: controller.signal });
    controller.abort(reason);

    await expect(upload).rejects.toBe(reason);
  });

  describe("uploadDeviceAttributes", () => {
    it("should forward attributes in the requested scope", async () => {
      const attributes = { serialNumber: "SN-0001", alertThresholds: { min: 10, max: 35 } };

      const result = await service.uploadDeviceAttributes("device-1", "SHARED_SCOPE", attributes);

      expect(result).toEqual({ deviceId: "device-1", scope: "SHARED_SCOPE", keys: ["serialNumber", "alertThresholds"] });
      expect(upstream.attributeCalls).toEqual([{ targetId: "device-1", scope: "SHARED_SCOPE", attributes }]);
    });

    it.each([
      ["an empty object", {}],
      ["an array", [{ serialNumber: "SN-0001" }]],
      ["null", null],
    ])("should reject %s without calling upstream", async (_label, attributes) => {
      await expect(service.uploadDeviceAttributes("device-1", "SERVER_SCOPE", attributes)).rejects.toMatchObject({
        errorCause: {
          kind: "validation",
          message: "No attributes provided",
          fieldErrors: [{ field: "attributes", constraints: ["attributes must be a non-empty object"] }],
        },
      });
      expect(upstream.attributeCalls).toHaveLength(0);
    });

    it("should map upstream failures the same way as telemetry uploads", async () => {
      upstream.respondTo("device-9", {
        type: "failure",
        failure: { statusCode: 404, message: "Upstream responded with status 404" },
      });
      upstream.respondTo("device-2", { type: "hang" });

      await expect(service.uploadDeviceAttributes("device-9", "SERVER_SCOPE", { a: 1 })).rejects.toMatchObject({
        errorCause: { kind: "not_found", message: "Device device-9 not found" },
      });
      await expect(service.uploadDeviceAttributes("device-2", "SERVER_SCOPE", { a: 1 })).rejects.toMatchObject({
        errorCause: { kind: "upstream", message: "Upload timed out after 50ms", timedOut: true },
      });
    });
  });
});
