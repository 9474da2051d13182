// OSC: ESC ] <payload> terminated by BEL (\x07) or ST (ESC \)
const OSC_PATTERN = "\\x1b\\][^\\x07\\x1b]*(?:\\x07|\\x1b\\\\)";

// CSI: ESC [ <params> <final_byte> (colors, cursor moves and erases)
const CSI_PATTERN = "\\x1b\\[[0-9;?]*[A-Za-z@]";

const STRIP_REGEX = new RegExp(`${OSC_PATTERN}|${CSI_PATTERN}`, "g");

export function stripAnsi(input: string): string {
  return input.replace(STRIP_REGEX, "");
}

/**
 * Combine a tool's stdout and stderr into one plain-text blob: escapes
 * removed, CRLF and progress-bar carriage returns collapsed, trailing
 * whitespace trimmed.
 */
export function combineToolOutput(stdout: string, stderr: string): string {
  const parts = [stdout, stderr].map((part) => normaliseNewlines(stripAnsi(part)).trimEnd());
  return parts.filter((part) => part.length > 0).join("\n");
}

function normaliseNewlines(input: string): string {
  return input
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((line) => {
      // A bare CR redraws the line; keep what was drawn last.
      const idx = line.lastIndexOf("\r");
      return idx >= 0 ? line.slice(idx + 1) : line;
    })
    .join("\n");
}
