const RESERVED_CHARS_REGEX = /[<>:"/\\|?*]/g;
const CONTROL_CHARS_REGEX = new RegExp(`[${String.fromCharCode(0)}-${String.fromCharCode(31)}]`, "g");
const WINDOWS_RESERVED_NAMES = /^(?:con|prn|aux|nul|com[1-9]|lpt[1-9])(?:\..*)?$/i;
// Bytes, leaving room for an extension within the usual 255-byte name limit
const MAX_SEGMENT_BYTES = 200;

// Cuts on code point boundaries so multi-byte characters stay whole.
export function truncateUtf8(value: string, maxBytes: number): string {
  let bytes = 0;
  let result = "";
  for (const char of value) {
    bytes += Buffer.byteLength(char, "utf8");
    if (bytes > maxBytes) {
      break;
    }
    result += char;
  }
  return result;
}

// Makes one directory/file name safe: no separators, reserved or control characters,
// no trailing dots/spaces, never "." or "..".
export function sanitizePathSegment(value: string, replacement = "_"): string {
  let segment = value
    .normalize("NFC")
    .replace(CONTROL_CHARS_REGEX, "")
    .replace(RESERVED_CHARS_REGEX, replacement)
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[. ]+$/u, "");

  if (Buffer.byteLength(segment, "utf8") > MAX_SEGMENT_BYTES) {
    segment = truncateUtf8(segment, MAX_SEGMENT_BYTES).replace(/[. ]+$/u, "");
  }
  if (!segment || /^\.+$/.test(segment)) {
    return replacement;
  }
  if (WINDOWS_RESERVED_NAMES.test(segment)) {
    return `${replacement}${segment}`;
  }
  return segment;
}
