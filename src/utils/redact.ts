/**
 * Credentials shorter than this are refused at config load. Masking a shorter
 * value would rewrite ordinary words in the text.
 */
export const MIN_SECRET_LENGTH = 8;

/**
 * Masks every occurrence of the given secrets in a piece of text. Response
 * bodies from the ingestion and query boundaries can echo request headers, so
 * they pass through here before they are logged or kept in a record.
 */
export function redactSecrets(text: string, secrets: Array<string | undefined>): string {
  let out = text;
  for (const s of secrets) {
    if (!s || s.length < MIN_SECRET_LENGTH) continue;
    out = out.split(s).join('***');
  }
  return out;
}
