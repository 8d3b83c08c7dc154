/**
 * Plain-text formatting for backend replies before they go to Telegram.
 *
 * The backend answers in loose markdown. Telegram gets the reply as plain
 * text, so markdown emphasis and a few known field labels are swapped for
 * emoji markers instead of being rendered.
 */

export const TELEGRAM_MAX_LENGTH = 4000;
const TRUNCATED_LENGTH = 3996;
const ELLIPSIS = '...';

export const MARKERS = {
  bold: '🎨',
  why: '💡',
  when: '📅',
  where: '📍',
  location: '📍',
  price: '💰',
  moreInfo: '🔗',
  // Appended to the list number: "1" + keycap -> 1️⃣
  keycap: '\uFE0F\u20E3',
} as const;

export interface TextRule {
  readonly name: string;
  apply(text: string): string;
}

const FIELD_LABELS: ReadonlyArray<readonly [RegExp, string]> = [
  [/(Why you[^:]*:)/g, MARKERS.why],
  [/(When:)/g, MARKERS.when],
  [/(Where:)/g, MARKERS.where],
  [/(Location:)/g, MARKERS.location],
  [/(Price:)/g, MARKERS.price],
  [/(More Info:)/g, MARKERS.moreInfo],
];

export const boldRule: TextRule = {
  name: 'bold',
  apply: (text) => text.replace(/\*\*([^*]+)\*\*/g, `${MARKERS.bold} $1`),
};

export const fieldLabelRule: TextRule = {
  name: 'field-labels',
  apply: (text) =>
    FIELD_LABELS.reduce(
      (acc, [pattern, marker]) => acc.replace(pattern, `${marker} $1`),
      text,
    ),
};

export const numberedListRule: TextRule = {
  name: 'numbered-list',
  apply: (text) => text.replace(/^(\d+)\.\s+/gm, `\n$1${MARKERS.keycap} `),
};

export const blankLineRule: TextRule = {
  name: 'blank-lines',
  apply: (text) => text.replace(/\n{3,}/g, '\n\n'),
};

export const trimRule: TextRule = {
  name: 'trim',
  apply: (text) => text.trim(),
};

/**
 * Applied in order. Bold goes first so the label patterns see plain text,
 * and blank-line collapsing runs after the list rule has added its newlines.
 */
export const DISPLAY_RULES: readonly TextRule[] = [
  boldRule,
  fieldLabelRule,
  numberedListRule,
  blankLineRule,
  trimRule,
];

export function formatForDisplay(text: string): string {
  return DISPLAY_RULES.reduce((acc, rule) => rule.apply(acc), text);
}

const isHighSurrogate = (code: number): boolean =>
  code >= 0xd800 && code <= 0xdbff;

/**
 * Cuts text that would exceed Telegram's message size. The cut never lands
 * inside a surrogate pair, so a marker emoji at the boundary is dropped whole.
 */
export function truncateForTelegram(text: string): string {
  if (text.length <= TELEGRAM_MAX_LENGTH) return text;
  const end = isHighSurrogate(text.charCodeAt(TRUNCATED_LENGTH - 1))
    ? TRUNCATED_LENGTH - 1
    : TRUNCATED_LENGTH;
  return text.slice(0, end) + ELLIPSIS;
}
