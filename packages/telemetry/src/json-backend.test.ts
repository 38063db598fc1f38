import { describe, it, expect, vi } from "vitest";
import { FieldCollection } from "./field-collection.js";
import { boolean, float, integer, sequence, string } from "./field.js";
import { JsonTelemetryBackend } from "./json-backend.js";
import type { TelemetryService } from "./types.js";

function fakeService(submit: TelemetryService["submit"] = vi.fn().mockResolvedValue(undefined)) {
  return {
    submit: vi.fn(submit),
    verify: vi.fn().mockResolvedValue(false),
  };
}

function makeBackend(service: TelemetryService) {
  return new JsonTelemetryBackend({
    endpointUrl: "https://example.com/telemetry",
    username: "tester",
    token: "test-token",
    service,
  });
}

describe("JsonTelemetryBackend", () => {
  it("groups fields by category with None at the top level", () => {
    const collection = new FieldCollection();
    collection.add("None", "TelemetryId", integer(42n));
    collection.add("Session", "Init_Time", integer(1000));
    collection.add("App", "Git_IsDirty", boolean(true));
    collection.add("UserSystem", "CPU_Vendor", string("Amd"));
    collection.add("UserConfig", "Renderer_ResolutionFactor", float(1.5));
    collection.add("UserSystem", "Cores", sequence([0, 1]));

    const backend = makeBackend(fakeService());
    collection.accept(backend);

    expect(JSON.parse(backend.toJson())).toEqual({
      TelemetryId: 42,
      App: { Git_IsDirty: true },
      Session: { Init_Time: 1000 },
      UserSystem: { CPU_Vendor: "Amd", Cores: [0, 1] },
      UserConfig: { Renderer_ResolutionFactor: 1.5 },
    });
  });

  it("omits empty sections", () => {
    const backend = makeBackend(fakeService());
    expect(backend.toJson()).toBe("{}");
  });

  it("lets a later duplicate overwrite the earlier value", () => {
    const collection = new FieldCollection();
    collection.add("App", "BuildName", string("first"));
    collection.add("App", "BuildName", string("second"));

    const backend = makeBackend(fakeService());
    collection.accept(backend);

    expect(backend.toJson()).toBe('{"App":{"BuildName":"second"}}');
  });

  it("writes integers beyond the safe range as strings", () => {
    const collection = new FieldCollection();
    collection.add("None", "TelemetryId", integer(0xffffffffffffffffn));

    const backend = makeBackend(fakeService());
    collection.accept(backend);

    expect(backend.toJson()).toBe('{"TelemetryId":"18446744073709551615"}');
  });

  it("drops a top-level field that collides with a section name", () => {
    const collection = new FieldCollection();
    collection.add("None", "App", string("shadow"));
    collection.add("None", "TelemetryId", integer(1));
    collection.add("App", "BuildName", string("n"));

    const backend = makeBackend(fakeService());
    collection.accept(backend);

    expect(backend.toJson()).toBe('{"TelemetryId":1,"App":{"BuildName":"n"}}');
  });

  it("keeps a colliding top-level name out even without that section", () => {
    const collection = new FieldCollection();
    collection.add("None", "Session", integer(5));

    const backend = makeBackend(fakeService());
    collection.accept(backend);

    expect(backend.toJson()).toBe("{}");
  });

  it("writes non-finite floats as strings", () => {
    const collection = new FieldCollection();
    collection.add("UserConfig", "A", float(Number.NaN));
    collection.add("UserConfig", "B", float(Number.POSITIVE_INFINITY));
    collection.add("UserConfig", "C", float(Number.NEGATIVE_INFINITY));

    const backend = makeBackend(fakeService());
    collection.accept(backend);

    expect(backend.toJson()).toBe('{"UserConfig":{"A":"NaN","B":"Infinity","C":"-Infinity"}}');
  });

  it("submits the document with endpoint and credentials on complete()", async () => {
    const service = fakeService();
    const backend = makeBackend(service);
    const collection = new FieldCollection();
    collection.add("App", "Git_Branch", string("main"));
    collection.accept(backend);

    backend.complete();
    await backend.whenSubmitted();

    expect(service.submit).toHaveBeenCalledTimes(1);
    expect(service.submit).toHaveBeenCalledWith(
      "https://example.com/telemetry",
      { username: "tester", token: "test-token" },
      '{"App":{"Git_Branch":"main"}}',
    );
  });

  it("submits only once", async () => {
    const service = fakeService();
    const backend = makeBackend(service);

    backend.complete();
    backend.complete();
    await backend.whenSubmitted();

    expect(service.submit).toHaveBeenCalledTimes(1);
  });

  it("swallows submission failures", async () => {
    const service = fakeService(() => Promise.reject(new Error("HTTP 500: Internal Server Error")));
    const backend = makeBackend(service);

    expect(() => backend.complete()).not.toThrow();
    await expect(backend.whenSubmitted()).resolves.toBeUndefined();
    expect(service.submit).toHaveBeenCalledTimes(1);
  });

  it("resolves whenSubmitted() before complete() is called", async () => {
    const backend = makeBackend(fakeService());
    await expect(backend.whenSubmitted()).resolves.toBeUndefined();
  });
});
