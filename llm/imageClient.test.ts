import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import type { VertexImageConfig } from "../config/services.js";
import { buildImagePayload, generateImage } from "./imageClient.js";

const CONFIG: VertexImageConfig = {
  projectId: "test-project",
  location: "us-central1",
  apiKey: "test-key",
  timeoutMs: 1000,
};

function jsonResponse(status: number, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

describe("buildImagePayload", () => {
  it("should default to one 1024px image", () => {
    expect(buildImagePayload({ prompt: "a cat" })).toEqual({
      instances: [{ prompt: "a cat" }],
      parameters: { sampleCount: 1, imageSize: "1024x1024" },
    });
  });

  it("should carry size, seed and the negative prompt", () => {
    expect(buildImagePayload({ prompt: "a cat", size: "512", seed: 42, negative: "blur" })).toEqual({
      instances: [{ prompt: "a cat. Avoid: blur" }],
      parameters: { sampleCount: 1, imageSize: "512x512", seed: 42, negativePrompt: "blur" },
    });
  });
});

describe("generateImage", () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should decode the first prediction from the predict endpoint", async () => {
    mockFetch.mockResolvedValue(
      jsonResponse(200, {
        predictions: [{ bytesBase64Encoded: "", b64: Buffer.from("png-bytes").toString("base64") }],
      }),
    );

    const image = await generateImage(CONFIG, { prompt: "a cat" });

    expect(image?.toString()).toBe("png-bytes");
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      "https://us-central1-aiplatform.googleapis.com/v1/projects/test-project/locations/us-central1" +
        "/publishers/google/models/imagegeneration:predict?key=test-key",
    );
  });

  it("should return null for a rejected request", async () => {
    mockFetch.mockResolvedValue(jsonResponse(400, { error: "bad prompt" }));

    expect(await generateImage(CONFIG, { prompt: "a cat" })).toBeNull();
  });

  it("should return null when the response has no image", async () => {
    mockFetch.mockResolvedValue(jsonResponse(200, { predictions: [] }));

    expect(await generateImage(CONFIG, { prompt: "a cat" })).toBeNull();
  });

  it("should return null when the payload decodes to nothing", async () => {
    mockFetch.mockResolvedValue(jsonResponse(200, { predictions: [{ bytesBase64Encoded: "!!!!" }] }));

    expect(await generateImage(CONFIG, { prompt: "a cat" })).toBeNull();
  });

  it("should return null when the request fails", async () => {
    mockFetch.mockRejectedValue(new Error("timeout"));

    expect(await generateImage(CONFIG, { prompt: "a cat" })).toBeNull();
  });
});
