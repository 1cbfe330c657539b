import type { VertexImageConfig } from "../config/services.js";
import { logger } from "../config/logger.js";

export type ImageSize = "512" | "768" | "1024";

export interface ImageRequest {
  readonly prompt: string;
  readonly size?: ImageSize;
  readonly seed?: number;
  readonly negative?: string;
}

const SIZE_MAP: Readonly<Record<ImageSize, string>> = {
  "512": "512x512",
  "768": "768x768",
  "1024": "1024x1024",
};

interface VertexPrediction {
  readonly bytesBase64Encoded?: string;
  readonly b64?: string;
  readonly imageBytes?: string;
}

interface VertexPredictResponse {
  readonly predictions?: readonly VertexPrediction[];
}

export function buildImagePayload(request: ImageRequest): Record<string, unknown> {
  const parameters: Record<string, unknown> = {
    sampleCount: 1,
    imageSize: SIZE_MAP[request.size ?? "1024"],
  };
  if (request.seed) {
    parameters["seed"] = request.seed;
  }

  let prompt = request.prompt;
  if (request.negative) {
    parameters["negativePrompt"] = request.negative;
    prompt = `${request.prompt}. Avoid: ${request.negative}`;
  }

  return { instances: [{ prompt }], parameters };
}

/**
 * Generates one image through the Vertex AI `predict` endpoint.
 * Resolves to null on any failure so the caller can tell a failed generation
 * apart from an admitted one without consuming quota.
 */
export async function generateImage(
  config: VertexImageConfig,
  request: ImageRequest,
): Promise<Buffer | null> {
  const url =
    `https://${config.location}-aiplatform.googleapis.com/v1/projects/${config.projectId}` +
    `/locations/${config.location}/publishers/google/models/imagegeneration:predict` +
    `?key=${encodeURIComponent(config.apiKey)}`;

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildImagePayload(request)),
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text();
      logger.error({ status: response.status, body }, "Vertex image generation rejected");
      return null;
    }

    const data = (await response.json()) as VertexPredictResponse;
    const prediction = data.predictions?.[0];
    const encoded = prediction?.bytesBase64Encoded || prediction?.b64 || prediction?.imageBytes;

    if (!encoded) {
      logger.error("No image base64 in Vertex response");
      return null;
    }

    const image = Buffer.from(encoded, "base64");
    if (image.length === 0) {
      logger.error("Vertex image payload decoded to zero bytes");
      return null;
    }

    return image;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, "Vertex image generation failed");
    return null;
  }
}
