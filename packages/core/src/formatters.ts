import type { ColumnFormat } from "@tracetab/contracts";

export type FormatOutcome = { ok: true; value: string } | { ok: false; reason: string };

const HEX_COUNT_PATTERN = /^[0-9a-f]{1,8}$/i;
const HEX_BYTE_PATTERN = /^[0-9a-f]{2}$/i;
const TRAILING_ID_PATTERN = /^(.*\S)\s*\(\d+\)\s*$/;
const MIN_HEX_DIGITS = 8;

/**
 * Decodes an exported binary value such as `00000004 e8 03 00 00`: a byte
 * count (hex) followed by little-endian byte tokens. The result is a `0x`
 * literal, most significant byte first, padded to at least eight digits.
 */
export function decodeHexByteSequence(raw: string): FormatOutcome {
  const [countToken, ...byteTokens] = raw.trim().split(/\s+/);
  if (!countToken || !HEX_COUNT_PATTERN.test(countToken)) {
    return { ok: false, reason: `byte count field is not hexadecimal: "${countToken ?? ""}"` };
  }
  if (byteTokens.length === 0) {
    return { ok: false, reason: "no byte tokens" };
  }

  const declared = Number.parseInt(countToken, 16);
  if (declared !== byteTokens.length) {
    return { ok: false, reason: `declared ${declared} bytes but found ${byteTokens.length}` };
  }

  const invalid = byteTokens.find((token) => !HEX_BYTE_PATTERN.test(token));
  if (invalid !== undefined) {
    return { ok: false, reason: `"${invalid}" is not a two-digit hex byte` };
  }

  const digits = byteTokens
    .slice()
    .reverse()
    .join("")
    .toLowerCase()
    .padStart(Math.max(MIN_HEX_DIGITS, byteTokens.length * 2), "0");
  return { ok: true, value: `0x${digits}` };
}

/** Returns the input unchanged when it is not a well-formed byte sequence. */
export function formatHexByteSequence(raw: string): string {
  const outcome = decodeHexByteSequence(raw);
  return outcome.ok ? outcome.value : raw;
}

// "chrome.exe (1234)" -> "chrome.exe"; "svc (Local Service)" is kept as is.
export function stripTrailingIdentifier(raw: string): string {
  const match = raw.match(TRAILING_ID_PATTERN);
  return match?.[1] ?? raw;
}

export function applyColumnFormat(format: ColumnFormat, raw: string): FormatOutcome {
  switch (format) {
    case "hex_bytes":
      return decodeHexByteSequence(raw);
    case "strip_identifier":
      return { ok: true, value: stripTrailingIdentifier(raw) };
    case "trim":
      return { ok: true, value: raw.trim() };
  }
}

export function isColumnFormat(value: string): value is ColumnFormat {
  return value === "hex_bytes" || value === "strip_identifier" || value === "trim";
}
