// ---------------------------------------------------------------------------
// Oracle prompts
// ---------------------------------------------------------------------------
// Wording is free to change; the inputs each prompt carries are not.
// ---------------------------------------------------------------------------

import type { OracleRequest } from "./types.js";

export const FIX_INSTRUCTION =
  "I encountered these Arduino compiler errors for the following sketch. " +
  "Rewrite ONLY the corrected code (no prose, no comments, no code fences), fixing the issues. " +
  "Do not change features, just fix errors.";

export function buildSketchPrompt(request: string, boardName: string): OracleRequest {
  return {
    purpose: "generate_sketch",
    prompt:
      `Write Arduino C++ code for ${request} for this microcontroller: '${boardName}'. ` +
      "Include all required libraries and header files. Output code only, no comments or code fences. " +
      "Do not assume database persistence. Only include what the prompt asks.",
  };
}

export function buildLibraryListPrompt(source: string, boardName: string): OracleRequest {
  return {
    purpose: "list_libraries",
    prompt:
      "List all the Arduino library names (as in Arduino Library Manager) required to compile code " +
      `for the ${boardName} microcontroller. List only names, one per line, no other text.\n` +
      `CODE:\n${source}`,
  };
}

export function buildRepositoryPrompt(library: string, boardName: string): OracleRequest {
  return {
    purpose: "repository_url",
    prompt: [
      "You are an expert on Arduino libraries and source repositories.",
      `For the microcontroller library '${library}' supporting the board '${boardName}':`,
      "1. Provide ONLY the official repository homepage URL of the library.",
      "2. Do NOT provide ZIP or archive download links.",
      "3. Do NOT include explanations or markdown formatting, only the plain link.",
      "Return ONLY the URL as plain text.",
    ].join("\n"),
  };
}

export function buildFixPrompt(compileOutput: string, source: string): OracleRequest {
  return {
    purpose: "fix_sketch",
    prompt: `${FIX_INSTRUCTION}\nCompiler errors:\n${compileOutput}\nCode:\n${source}\n`,
  };
}

export function buildWiringPrompt(source: string, boardName: string): OracleRequest {
  return {
    purpose: "wiring",
    prompt: [
      `You are an Arduino hardware expert. The following Arduino C++ code is written for the microcontroller '${boardName}'.`,
      "Analyze the code and provide a complete pin-by-pin wiring table.",
      "For every hardware component and every board pin used or referenced in the code, list how each wire connects the component to the board.",
      "",
      "Format the answer as a CONNECTIONS TABLE with columns: [Board Pin], [Component], [Component Pin/Terminal], [Purpose/Signal].",
      "Only list wires essential for this code to function.",
      "",
      `BOARD: ${boardName}`,
      `CODE:\n${source}`,
    ].join("\n"),
  };
}
