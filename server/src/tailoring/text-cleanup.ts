const META_LINE = new RegExp(
  [
    String.raw`^(?:sure[,!.]?\s*)?here(?:'s| is| are)\b.*:?\s*$`,
    String.raw`^(?:claro[,!.]?\s*)?aqu[ií] (?:tienes|est[aá]n?)\b.*:?\s*$`,
    String.raw`^(?:translation|translated text|output|result|note|nota|resultado|traducci[oó]n)\s*:.*$`,
    String.raw`^(?:i hope|espero que|let me know|av[ií]same)\b.*$`,
  ].join('|'),
  'i',
);

const LABEL_PREFIX = /^(?:translation|translated|output|result|key skills|competencias clave|habilidades clave|profile|perfil|summary|resumen)\s*:\s*/i;

/**
 * Strip the chatter models wrap around the requested text: intro and
 * sign-off lines, markdown headers, bold/italic markers, wrapping quotes.
 */
export function cleanCompletionText(raw: string): string {
  const lines = raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim());

  const kept: string[] = [];
  for (const line of lines) {
    if (META_LINE.test(line) && !LABEL_PREFIX.test(line)) continue;
    const unlabeled = line.replace(LABEL_PREFIX, '');
    const text = unlabeled
      .replace(/^#{1,6}\s+/, '')
      .replace(/\*\*(.+?)\*\*/g, '$1')
      .replace(/__(.+?)__/g, '$1')
      .replace(/(^|[\s(])\*(\S[^*]*?)\*(?=[\s).,;:!?]|$)/g, '$1$2');
    kept.push(text);
  }

  return kept
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
    .replace(/^["'“”‘’]+|["'“”‘’]+$/g, '')
    .trim();
}

/** Individual bullet lines with glyphs and numbering removed. */
export function splitBullets(text: string): string[] {
  return cleanCompletionText(text)
    .split('\n')
    .map((line) => line.replace(/^(?:[-*•·–—▪●]|\d+[.)])\s*/, '').trim())
    .filter((line) => line.length > 0);
}

/** First non-empty line; used for one-line slots such as a role title. */
export function firstLine(text: string): string {
  return cleanCompletionText(text).split('\n').find((line) => line.trim().length > 0)?.trim() ?? '';
}

/** Comma/newline separated list, de-bulleted. */
export function splitList(text: string): string[] {
  return cleanCompletionText(text)
    .split(/[\n,;]/)
    .map((item) => item.replace(/^(?:[-*•·]|\d+[.)])\s*/, '').trim())
    .filter((item) => item.length > 0);
}
