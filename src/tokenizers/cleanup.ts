/**
 * Decode Clean-Up
 *
 * @module tokenizers/cleanup
 */

const CLEANUP_RULES: ReadonlyArray<readonly [string, string]> = [
  [' .', '.'],
  [' ?', '?'],
  [' !', '!'],
  [' ,', ','],
  [" ' ", "'"],
  [" n't", "n't"],
  [" 'm", "'m"],
  [" 's", "'s"],
  [" 've", "'ve"],
  [" 're", "'re"],
];

/**
 * Remove the space a word-level join leaves before punctuation and English
 * contractions.
 */
export function cleanUpTokenization(text: string): string {
  let output = text;
  for (const [from, to] of CLEANUP_RULES) {
    output = output.split(from).join(to);
  }
  return output;
}
