// ---------------------------------------------------------------------------
// Upload with port fallback
// ---------------------------------------------------------------------------
// Compile once, upload to the preferred port, then walk the remaining ports
// in listed order until one accepts. A plain linear retry, nothing more.
// ---------------------------------------------------------------------------

import type { ServiceLog } from "../logging.js";
import type { SerialPortInfo, Toolchain } from "../toolchain/types.js";

export type UploadParams = {
  sketchPath: string;
  fqbn: string;
  /** Explicit port; tried first even if the toolchain does not list it. */
  port?: string;
};

export type UploadResult = {
  ok: boolean;
  /** Port that accepted the upload. */
  port?: string;
  /** Ports attempted, in order. */
  tried: string[];
  output: string;
};

/** Explicit port, else the first port that looks like an Arduino, else the first port. */
export function pickPreferredPort(ports: readonly SerialPortInfo[], explicit?: string): string | undefined {
  if (explicit) {
    return explicit;
  }
  const arduino = ports.find((p) => /arduino/i.test(p.label) || /arduino/i.test(p.boardName ?? ""));
  return (arduino ?? ports[0])?.address;
}

export async function uploadWithFallback(
  deps: { toolchain: Toolchain; log: ServiceLog },
  params: UploadParams,
): Promise<UploadResult> {
  const { toolchain, log } = deps;
  const ports = await toolchain.listPorts();
  const preferred = pickPreferredPort(ports, params.port);
  if (!preferred) {
    log.error("No serial ports detected");
    return { ok: false, tried: [], output: "no serial ports detected" };
  }

  const compiled = await toolchain.compile(params.sketchPath, params.fqbn);
  if (!compiled.ok) {
    log.error("Compilation failed; nothing uploaded");
    return { ok: false, tried: [], output: compiled.output };
  }

  const order = [preferred, ...ports.map((p) => p.address).filter((a) => a !== preferred)];
  const tried: string[] = [];
  let output = "";
  for (const port of order) {
    tried.push(port);
    log.info(`Uploading to ${port}`);
    const result = await toolchain.upload(params.sketchPath, params.fqbn, port);
    output = result.output;
    if (result.ok) {
      log.info(`Upload succeeded on ${port}`);
      return { ok: true, port, tried, output };
    }
    log.warn(`Upload failed on ${port}`);
  }
  return { ok: false, tried, output };
}
