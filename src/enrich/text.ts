const URL_PATTERN = /https?:\/\/\S+|www\.\S+/g;
const TAG_PATTERN = /<.*?>/g;

/** Text sent for embedding: URLs and markup tags removed, then trimmed. */
export function stripUrlsAndMarkup(text: string): string {
  return text.replace(URL_PATTERN, "").replace(TAG_PATTERN, "").trim();
}
