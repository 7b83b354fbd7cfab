/**
 * Text clean-up shared by the book stages.
 */

const EMPTY_IMAGE_ALT = /!\[\]\(([^)]+)\)/g;
const EMPTY_CODE_BLOCK = /```\s+```/g;
const EXTRA_BLANK_LINES = /\n{3,}/g;

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

export function cleanMarkdown(text: string): string {
  const cleaned = text
    .replace(EMPTY_IMAGE_ALT, '![image]($1)')
    .replace(EMPTY_CODE_BLOCK, '')
    .replace(EXTRA_BLANK_LINES, '\n\n')
    .trim();
  return cleaned.length > 0 ? `${cleaned}\n` : '';
}

/**
 * First line of the document without heading and emphasis markers
 */
export function extractTitle(markdown: string): string | null {
  const firstLine = markdown.split('\n', 1)[0]?.trim() ?? '';
  const title = firstLine.replace(/^#+\s*/, '').replace(/[`*_]/g, '').trim();
  return title.length > 0 ? title : null;
}
