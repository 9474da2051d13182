// ---------------------------------------------------------------------------
// Scripted oracle – deterministic stand-in for tests and dry runs
// ---------------------------------------------------------------------------

import { OracleError } from "../errors.js";
import type { Oracle, OraclePurpose, OracleRequest } from "./types.js";

export type ScriptedReply = string | Error;
export type ScriptedResponder = (prompt: string, callIndex: number) => ScriptedReply;
export type OracleScript = Partial<Record<OraclePurpose, ScriptedReply[] | ScriptedResponder>>;

/**
 * Replies per purpose, either from a queue (consumed in order) or from a
 * responder function. `Error` replies are thrown. Every request is recorded.
 */
export class ScriptedOracle implements Oracle {
  readonly requests: OracleRequest[] = [];
  private readonly callCounts = new Map<OraclePurpose, number>();

  constructor(private readonly script: OracleScript) {}

  async generate(request: OracleRequest): Promise<string> {
    this.requests.push(request);
    const callIndex = this.callCounts.get(request.purpose) ?? 0;
    this.callCounts.set(request.purpose, callIndex + 1);

    const entry = this.script[request.purpose];
    let reply: ScriptedReply | undefined;
    if (typeof entry === "function") {
      reply = entry(request.prompt, callIndex);
    } else if (entry) {
      reply = entry.shift();
    }

    if (reply === undefined) {
      throw new OracleError(`No scripted reply for ${request.purpose} (call ${callIndex})`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  requestsFor(purpose: OraclePurpose): OracleRequest[] {
    return this.requests.filter((r) => r.purpose === purpose);
  }
}
