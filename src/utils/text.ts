export const SNIPPET_LENGTH = 50;

/** Cuts `text` to `length` characters and appends `...` when it was longer. */
export const truncate = (text: string, length: number = SNIPPET_LENGTH): string =>
  text.length > length ? `${text.slice(0, length)}...` : text;

const MENTION_PATTERN = /@(\w+)/g;

/** Usernames mentioned as `@name`, in order of first appearance, without repeats. */
export function extractMentions(content: string): string[] {
  const seen = new Set<string>();
  for (const match of content.matchAll(MENTION_PATTERN)) {
    seen.add(match[1]);
  }
  return [...seen];
}
