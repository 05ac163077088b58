import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ReplicateImageClient } from "../clients/image.js";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

const dimensions = { width: 512, height: 512 };

describe("ReplicateImageClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("creates a prediction, polls it and downloads the output", async () => {
    fetchMock
      .mockResolvedValueOnce(json({ id: "p1", status: "starting" }))
      .mockResolvedValueOnce(
        json({ id: "p1", status: "succeeded", output: ["https://cdn.example.com/p1/out.webp"] })
      )
      .mockResolvedValueOnce(
        new Response(new Uint8Array([1, 2, 3]), { headers: { "content-type": "image/webp" } })
      );
    const client = new ReplicateImageClient({
      apiToken: "test-token",
      model: "owner/model:abc123",
      pollIntervalMs: 0,
    });

    const result = await client.generate("a compost heap at dawn", dimensions);

    expect(result).toEqual({
      ok: true,
      value: {
        data: new Uint8Array([1, 2, 3]),
        mimeType: "image/webp",
        extension: "webp",
        model: "owner/model:abc123",
      },
    });

    const [createUrl, createInit] = fetchMock.mock.calls[0];
    expect(String(createUrl)).toBe("https://api.replicate.com/v1/predictions");
    expect(JSON.parse(String(createInit?.body))).toEqual({
      version: "abc123",
      input: { prompt: "a compost heap at dawn", width: 512, height: 512, num_outputs: 1 },
    });
    expect(String(fetchMock.mock.calls[1][0])).toBe("https://api.replicate.com/v1/predictions/p1");
    expect(String(fetchMock.mock.calls[2][0])).toBe("https://cdn.example.com/p1/out.webp");
  });

  it("uses the model endpoint for unversioned models", async () => {
    fetchMock
      .mockResolvedValueOnce(
        json({ id: "p2", status: "succeeded", output: "https://cdn.example.com/p2/out.jpeg" })
      )
      .mockResolvedValueOnce(new Response(new Uint8Array([9]), { headers: {} }));
    const client = new ReplicateImageClient({ apiToken: "test-token", model: "owner/fast" });

    const result = await client.generate("prompt", dimensions);

    expect(String(fetchMock.mock.calls[0][0])).toBe(
      "https://api.replicate.com/v1/models/owner/fast/predictions"
    );
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.extension).toBe("jpg");
      expect(result.value.mimeType).toBe("image/jpeg");
    }
  });

  it("reports a failed prediction", async () => {
    fetchMock.mockResolvedValueOnce(json({ id: "p3", status: "failed", error: "NSFW content" }));
    const client = new ReplicateImageClient({
      apiToken: "test-token",
      model: "owner/model:v1",
      retry: { maxAttempts: 1 },
    });

    const result = await client.generate("prompt", dimensions);

    expect(result).toEqual({
      ok: false,
      error: { kind: "http", message: "Prediction p3 NSFW content" },
    });
  });

  it("fails without calling out when no token is configured", async () => {
    const client = new ReplicateImageClient({ model: "owner/model" });

    const result = await client.generate("prompt", dimensions);

    expect(result).toEqual({
      ok: false,
      error: { kind: "auth", message: "REPLICATE_API_TOKEN is not set" },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("checks health against the account endpoint", async () => {
    fetchMock.mockResolvedValueOnce(json({ username: "someone" }));
    const client = new ReplicateImageClient({ apiToken: "test-token", model: "owner/model" });

    expect(await client.healthCheck()).toEqual({ state: "available" });
    expect(String(fetchMock.mock.calls[0][0])).toBe("https://api.replicate.com/v1/account");
  });
});
