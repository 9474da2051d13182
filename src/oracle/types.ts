// ---------------------------------------------------------------------------
// Oracle – the generative text service behind every code and library query
// ---------------------------------------------------------------------------

export const ORACLE_PURPOSES = [
  "generate_sketch",
  "list_libraries",
  "repository_url",
  "fix_sketch",
  "wiring",
] as const;
export type OraclePurpose = (typeof ORACLE_PURPOSES)[number];

export type OracleRequest = {
  /** What the call is for; adapters use it for logging, doubles for routing. */
  purpose: OraclePurpose;
  prompt: string;
};

/**
 * A single request/response text generator. Implementations raise
 * `OracleError` on transport failure or an empty reply and never retry.
 */
export interface Oracle {
  generate(request: OracleRequest): Promise<string>;
}
