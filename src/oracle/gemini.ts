// ---------------------------------------------------------------------------
// Gemini oracle – production adapter over @google/genai
// ---------------------------------------------------------------------------

import { GoogleGenAI } from "@google/genai";
import { OracleError, formatErrorMessage } from "../errors.js";
import type { SubsystemLogger } from "../logging.js";
import type { Oracle, OracleRequest } from "./types.js";

/** The slice of the SDK client this adapter calls. */
export type GenerateContentClient = {
  models: {
    generateContent(params: { model: string; contents: string }): Promise<{ text?: string }>;
  };
};

export type GeminiOracleOptions = {
  model: string;
  apiKey?: string;
  /** Injected for tests; built from `apiKey` otherwise. */
  client?: GenerateContentClient;
  log?: SubsystemLogger;
};

export class GeminiOracle implements Oracle {
  private readonly client: GenerateContentClient;
  private readonly model: string;
  private readonly log?: SubsystemLogger;

  constructor(opts: GeminiOracleOptions) {
    if (opts.client) {
      this.client = opts.client;
    } else {
      if (!opts.apiKey) {
        throw new OracleError("No oracle API key configured (set oracle.apiKey or GEMINI_API_KEY)");
      }
      this.client = new GoogleGenAI({ apiKey: opts.apiKey });
    }
    this.model = opts.model;
    this.log = opts.log;
  }

  async generate(request: OracleRequest): Promise<string> {
    const startedAt = Date.now();
    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: request.prompt,
      });
      text = response.text;
    } catch (err) {
      this.log?.warn(`oracle ${request.purpose} failed: ${formatErrorMessage(err)}`);
      throw new OracleError(`Oracle request failed (${request.purpose}): ${formatErrorMessage(err)}`, {
        details: { purpose: request.purpose, model: this.model },
        cause: err,
      });
    }

    this.log?.debug(`oracle ${request.purpose} latencyMs=${Date.now() - startedAt}`);
    if (!text || !text.trim()) {
      throw new OracleError(`Oracle returned an empty response (${request.purpose})`, {
        details: { purpose: request.purpose, model: this.model },
      });
    }
    return text;
  }
}
