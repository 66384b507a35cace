import axios from "axios";
import type { Embedding } from "../types/attendance";
import { checkEmbedding } from "../utils/embedding";
import { componentLogger } from "../utils/logger";

const log = componentLogger("embedding-extractor");

export type ExtractionResult =
  | { ok: true; embedding: Embedding }
  | { ok: false; error: string };

/** The part of an axios instance the client needs. */
export interface EmbeddingHttp {
  post(url: string, body: unknown): Promise<{ data: unknown }>;
}

export interface EmbeddingExtractor {
  extractEmbedding(image: Buffer): Promise<ExtractionResult>;
}

function describeAxiosError(e: unknown): string {
  if (axios.isAxiosError(e)) {
    const data: unknown = e.response?.data;
    if (typeof data === "object" && data !== null && "error" in data && typeof data.error === "string") {
      return data.error;
    }
    if (e.response) return `AI service answered ${e.response.status}`;
    return e.code === "ECONNABORTED" ? "AI service timed out" : "AI service unreachable";
  }
  return e instanceof Error ? e.message : String(e);
}

/**
 * Client for the face-embedding service. The service takes a base64 image
 * and answers `{ embedding: number[] }`, or `{ error }` when no face is found.
 */
export class HttpEmbeddingExtractor implements EmbeddingExtractor {
  private readonly http: EmbeddingHttp;

  constructor(baseURL: string, timeoutMs: number, http?: EmbeddingHttp) {
    this.http = http ?? axios.create({ baseURL, timeout: timeoutMs });
  }

  async extractEmbedding(image: Buffer): Promise<ExtractionResult> {
    if (image.length === 0) return { ok: false, error: "Image is empty" };

    try {
      const res = await this.http.post("/embeddings", {
        image: image.toString("base64"),
      });
      const body = res.data;
      const raw = typeof body === "object" && body !== null && "embedding" in body ? body.embedding : undefined;
      const check = checkEmbedding(raw);
      if (!check.ok) {
        log.warn({ problem: check.message }, "AI service returned an unusable embedding");
        return { ok: false, error: "No usable face embedding could be extracted" };
      }
      return { ok: true, embedding: check.embedding };
    } catch (e) {
      const error = describeAxiosError(e);
      log.warn({ error }, "embedding extraction failed");
      return { ok: false, error };
    }
  }
}
