import type { DecodedUnit, SourceUnit } from "./types.js";

/** A unit whose content cannot be treated as text. The scan skips it. */
export class ScanUnitError extends Error {
  readonly unit: string;

  constructor(unit: string, message: string) {
    super(message);
    this.name = "ScanUnitError";
    this.unit = unit;
  }
}

const decoder = new TextDecoder("utf-8", { fatal: true });

export function decodeUnit(unit: SourceUnit): DecodedUnit {
  let text: string;
  if (typeof unit.content === "string") {
    text = unit.content;
  } else {
    try {
      text = decoder.decode(unit.content);
    } catch {
      throw new ScanUnitError(unit.id, `${unit.id} is not valid UTF-8 text`);
    }
  }

  if (text.includes("\u0000")) {
    throw new ScanUnitError(unit.id, `${unit.id} looks binary (contains NUL bytes)`);
  }

  // Strip BOM
  if (text.charCodeAt(0) === 0xfeff) text = text.slice(1);

  const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  return { id: unit.id, lines };
}

export function makeExcerpt(line: string, maxLength: number): string {
  const trimmed = line.trim();
  return trimmed.length > maxLength ? trimmed.substring(0, maxLength) + "..." : trimmed;
}
