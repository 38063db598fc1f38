import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { HttpTelemetryService } from "./http-service.js";

const credentials = { username: "tester", token: "test-token" };

describe("HttpTelemetryService", () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("submit()", () => {
    it("posts the payload with auth headers", async () => {
      mockFetch.mockResolvedValue({ ok: true, status: 200, statusText: "OK" });

      await new HttpTelemetryService().submit(
        "https://example.com/telemetry",
        credentials,
        '{"App":{}}',
      );

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledWith(
        "https://example.com/telemetry",
        expect.objectContaining({
          method: "POST",
          body: '{"App":{}}',
          headers: {
            "Content-Type": "application/json",
            "x-username": "tester",
            "x-token": "test-token",
          },
        }),
      );
    });

    it("rejects on a non-ok response", async () => {
      mockFetch.mockResolvedValue({ ok: false, status: 503, statusText: "Service Unavailable" });

      await expect(
        new HttpTelemetryService().submit("https://example.com/telemetry", credentials, "{}"),
      ).rejects.toThrow("HTTP 503: Service Unavailable");
    });

    it("propagates network errors", async () => {
      mockFetch.mockRejectedValue(new Error("Network error"));

      await expect(
        new HttpTelemetryService().submit("https://example.com/telemetry", credentials, "{}"),
      ).rejects.toThrow("Network error");
    });
  });

  describe("verify()", () => {
    it("is true when the profile username matches", async () => {
      mockFetch.mockResolvedValue({
        ok: true,
        status: 200,
        json: () => Promise.resolve({ username: "tester" }),
      });

      const verified = await new HttpTelemetryService().verify(
        "https://example.com/profile",
        credentials,
      );

      expect(verified).toBe(true);
      expect(mockFetch).toHaveBeenCalledWith(
        "https://example.com/profile",
        expect.objectContaining({
          method: "GET",
          headers: { "x-username": "tester", "x-token": "test-token" },
        }),
      );
    });

    it("is false when the profile belongs to someone else", async () => {
      mockFetch.mockResolvedValue({
        ok: true,
        status: 200,
        json: () => Promise.resolve({ username: "other" }),
      });

      await expect(
        new HttpTelemetryService().verify("https://example.com/profile", credentials),
      ).resolves.toBe(false);
    });

    it("is false for a malformed body", async () => {
      mockFetch.mockResolvedValue({
        ok: true,
        status: 200,
        json: () => Promise.resolve({ user: "tester" }),
      });

      await expect(
        new HttpTelemetryService().verify("https://example.com/profile", credentials),
      ).resolves.toBe(false);
    });

    it("is false on an error status", async () => {
      mockFetch.mockResolvedValue({ ok: false, status: 401, statusText: "Unauthorized" });

      await expect(
        new HttpTelemetryService().verify("https://example.com/profile", credentials),
      ).resolves.toBe(false);
    });
  });
});
