// ---------------------------------------------------------------------------
// Board catalog – human-readable names mapped to fully qualified board names
// ---------------------------------------------------------------------------

import { UnknownBoardError } from "../errors.js";

export type BoardProfile = Readonly<{
  name: string;
  fqbn: string;
}>;

const BOARDS: readonly BoardProfile[] = [
  { name: "Arduino Uno", fqbn: "arduino:avr:uno" },
  { name: "Arduino Mega", fqbn: "arduino:avr:mega" },
  { name: "Arduino Nano", fqbn: "arduino:avr:nano" },
  { name: "Arduino Leonardo", fqbn: "arduino:avr:leonardo" },
  { name: "Arduino Nano Every", fqbn: "arduino:megaavr:nanoevery" },
  { name: "Arduino Due", fqbn: "arduino:sam:due" },
  { name: "Arduino MKR Zero", fqbn: "arduino:samd:mkrzero" },
  { name: "ESP32 Dev", fqbn: "esp32:esp32:esp32" },
  { name: "NodeMCU 1.0 (ESP-12E Module)", fqbn: "esp8266:esp8266:nodemcuv2" },
];

export const DEFAULT_BOARD_NAME = "Arduino Uno";

export function listBoards(): readonly BoardProfile[] {
  return BOARDS;
}

/** Match a board by display name (case-insensitive) or by catalog FQBN. */
export function resolveBoard(nameOrFqbn: string): BoardProfile {
  const wanted = nameOrFqbn.trim().toLowerCase();
  const match = BOARDS.find((b) => b.name.toLowerCase() === wanted || b.fqbn === wanted);
  if (!match) {
    throw new UnknownBoardError(nameOrFqbn);
  }
  return match;
}
