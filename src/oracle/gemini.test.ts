import { describe, it, expect, vi } from "vitest";
import { OracleError } from "../errors.js";
import { GeminiOracle, type GenerateContentClient } from "./gemini.js";

function clientReturning(impl: () => Promise<{ text?: string }>) {
  const generateContent = vi.fn(impl);
  const client: GenerateContentClient = { models: { generateContent } };
  return { client, generateContent };
}

describe("GeminiOracle", () => {
  it("sends the prompt to the configured model and returns the text", async () => {
    const { client, generateContent } = clientReturning(async () => ({ text: "Servo\nDHT" }));
    const oracle = new GeminiOracle({ model: "test-model", client });

    const reply = await oracle.generate({ purpose: "list_libraries", prompt: "which libraries?" });

    expect(reply).toBe("Servo\nDHT");
    expect(generateContent).toHaveBeenCalledWith({ model: "test-model", contents: "which libraries?" });
  });

  it("wraps transport failures in OracleError", async () => {
    const { client } = clientReturning(async () => {
      throw new Error("quota exceeded");
    });
    const oracle = new GeminiOracle({ model: "test-model", client });

    await expect(oracle.generate({ purpose: "fix_sketch", prompt: "fix" })).rejects.toThrow(
      "Oracle request failed (fix_sketch): quota exceeded",
    );
  });

  it("treats an empty reply as an OracleError", async () => {
    const { client } = clientReturning(async () => ({ text: "  \n" }));
    const oracle = new GeminiOracle({ model: "test-model", client });

    await expect(oracle.generate({ purpose: "wiring", prompt: "pins" })).rejects.toBeInstanceOf(OracleError);
  });

  it("requires an API key when no client is injected", () => {
    expect(() => new GeminiOracle({ model: "test-model" })).toThrow(/No oracle API key/);
  });
});
