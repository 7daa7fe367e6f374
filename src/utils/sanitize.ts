/**
 * Input sanitization for text that crosses a trust boundary:
 * - feed HTML turned into stored plain text
 * - article text embedded into LLM prompts
 * - user input reaching SQL LIKE patterns or log lines
 */

/**
 * Maximum input length before regex processing to prevent ReDoS attacks
 */
const MAX_REGEX_INPUT_LENGTH = 10000;

function safeRegexTest(pattern: RegExp, input: string): boolean {
  if (input.length > MAX_REGEX_INPUT_LENGTH) {
    return true;
  }

  pattern.lastIndex = 0;
  return pattern.test(input);
}

const PROMPT_INJECTION_PATTERNS = [
  /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?|rules?)/gi,
  /disregard\s+(all\s+)?(previous|above|prior)/gi,
  /forget\s+(all\s+)?(previous|above|prior)/gi,
  /you\s+are\s+now\s+/gi,
  /new\s+instructions?:/gi,
  /\[\s*INST\s*\]/gi,
  /<\|im_start\|>/gi,
  /<\|im_end\|>/gi,
  /<<SYS>>/gi,
];

const LOG_DANGEROUS_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f]/g;

/**
 * Prepare third-party article text for inclusion in a prompt.
 * The text is kept (articles legitimately quote odd things) but chat-role
 * markers are neutralized and suspicious content is flagged for logging.
 */
export function sanitizeForPrompt(input: string): { sanitized: string; suspicious: boolean } {
  if (!input) {
    return { sanitized: '', suspicious: false };
  }

  const suspicious = PROMPT_INJECTION_PATTERNS.some((pattern) => safeRegexTest(pattern, input));

  const sanitized = input
    .replace(/<\|im_(start|end)\|>/gi, '')
    .replace(/\[\s*\/?INST\s*\]/gi, '')
    .replace(/<<\/?SYS>>/gi, '')
    .replace(/\[\s*(system|user|assistant)\s*\]/gi, '')
    .replace(/\0/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  return { sanitized, suspicious };
}

/**
 * Escape LIKE wildcards so user input matches literally (used with ESCAPE '\')
 */
export function escapeLikePattern(input: string): string {
  return input.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Sanitize input for safe logging (prevents log injection/forging)
 */
export function sanitizeForLog(input: string): string {
  if (!input) {
    return '';
  }

  return input
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(LOG_DANGEROUS_CHARS, '')
    .substring(0, 1000);
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  rsquo: '’',
  lsquo: '‘',
  rdquo: '”',
  ldquo: '“',
};

const ENTITY_PATTERN = /&(#\d+|#x[0-9a-f]+|[a-z]+);/gi;

/**
 * Decode entities in one pass, so `&amp;lt;` becomes `&lt;` and not `<`.
 * Unknown names are left as written.
 */
function decodeEntities(text: string): string {
  return text.replace(ENTITY_PATTERN, (match, body: string) => {
    if (body[0] === '#') {
      const hex = body[1] === 'x' || body[1] === 'X';
      return decodeCodePoint(parseInt(body.substring(hex ? 2 : 1), hex ? 16 : 10));
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/**
 * HTML to plain text for external content like RSS feeds.
 * Script and style bodies are dropped, tags removed, entities decoded and
 * whitespace collapsed.
 */
export function sanitizeHtml(html: string): string {
  if (!html) {
    return '';
  }

  const text = html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, ' ')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, ' ')
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1')
    .replace(/<(br|\/p|\/div|\/li|\/h[1-6])\b[^>]*>/gi, ' ')
    .replace(/<[^>]*>/g, '');

  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}

function decodeCodePoint(codePoint: number): string {
  if (!Number.isFinite(codePoint) || codePoint < 32 || codePoint > 0x10ffff) {
    return '';
  }
  return String.fromCodePoint(codePoint);
}
