/**
 * Derive a display name from an identifier by splitting on case boundaries.
 * "StepWithLinkText" → "Step With Link Text", "ReadDUTSerial" → "Read DUT Serial".
 */
export function displayNameFromId(id: string): string {
  return id
    .replace(/[_-]+/g, " ")
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .replace(/\s+/g, " ")
    .trim();
}
