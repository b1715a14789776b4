import { jsPDF } from 'jspdf';
import type { ComposedCoverLetter, ComposedCv, ComposedDocument, ComposedExperience } from '../tailoring/types.js';

type PdfStyle = 'name' | 'title' | 'contact' | 'heading' | 'subheading' | 'body' | 'bullet' | 'blank';

export interface PdfLine {
  text: string;
  style: PdfStyle;
}

interface PdfStyleConfig {
  bold: boolean;
  size: number;
  indent: number;
  lineHeight: number;
}

const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN_LEFT = 54;
const MARGIN_RIGHT = 54;
const MARGIN_TOP = 56;
const MARGIN_BOTTOM = 44;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN_LEFT - MARGIN_RIGHT;

const STYLE_MAP: Record<Exclude<PdfStyle, 'blank'>, PdfStyleConfig> = {
  name: { bold: true, size: 18, indent: 0, lineHeight: 24 },
  title: { bold: false, size: 11, indent: 0, lineHeight: 16 },
  contact: { bold: false, size: 10, indent: 0, lineHeight: 14 },
  heading: { bold: true, size: 11, indent: 0, lineHeight: 18 },
  subheading: { bold: true, size: 10, indent: 0, lineHeight: 14 },
  body: { bold: false, size: 10, indent: 0, lineHeight: 14 },
  bullet: { bold: false, size: 10, indent: 16, lineHeight: 14 },
};

const PAGE_LABEL = { en: 'Page', es: 'Página' } as const;
const OF_LABEL = { en: 'of', es: 'de' } as const;

/**
 * WinAnsi characters above U+00FF that jsPDF's standard fonts encode
 * natively; these skip the NFKD fallback.
 */
const WINANSI_ABOVE_FF = new Set([
  '\u20AC', '\u201A', '\u0192', '\u201E', '\u2026', '\u2020', '\u2021',
  '\u02C6', '\u2030', '\u0160', '\u2039', '\u0152', '\u017D',
  '\u2018', '\u2019', '\u201C', '\u201D', '\u2022', '\u2013', '\u2014',
  '\u02DC', '\u2122', '\u0161', '\u203A', '\u0153', '\u017E', '\u0178',
]);

/**
 * Text safe for the standard PDF fonts. Latin-1 (accents, ñ, ¿, ¡) and the
 * WinAnsi extras pass through; anything else is NFKD-decomposed or dropped.
 */
export function sanitizePdfText(input: string): string {
  return input
    .replace(/\s+/g, ' ')
    .replace(/[\u2023\u25E6\u2043\u00B7\u2027]/g, '\u2022')
    .replace(/\u2032/g, "'")
    .replace(/\u2033/g, '"')
    .replace(/\u02BC/g, '\u2019')
    .replace(/\u00A0/g, ' ')
    .replace(/[^\x00-\xFF]/g, (ch) => {
      if (WINANSI_ABOVE_FF.has(ch)) return ch;
      return ch.normalize('NFKD').replace(/[^\x00-\xFF]/g, '');
    })
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F\u200B-\u200F\u2028\u2029\uFEFF]/g, '')
    .trim();
}

function paragraphs(text: string, style: PdfStyle = 'body'): PdfLine[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => ({ text: line, style }));
}

function headerLines(doc: ComposedDocument): PdfLine[] {
  const lines: PdfLine[] = [{ text: doc.header.name.toUpperCase(), style: 'name' }];
  if (doc.header.title) lines.push({ text: doc.header.title, style: 'title' });
  if (doc.header.details.length > 0) lines.push({ text: doc.header.details.join(' | '), style: 'contact' });
  lines.push({ text: '', style: 'blank' });
  return lines;
}

function experienceLines(exp: ComposedExperience, withTechnologies: boolean): PdfLine[] {
  const lines: PdfLine[] = [
    { text: exp.organization ? `${exp.title}, ${exp.organization}` : exp.title, style: 'subheading' },
  ];
  if (exp.period) lines.push({ text: exp.period, style: 'body' });
  for (const bullet of exp.bullets) lines.push({ text: bullet, style: 'bullet' });
  if (withTechnologies && exp.technologies.length > 0) {
    lines.push({ text: exp.technologies.join(', '), style: 'body' });
  }
  lines.push({ text: '', style: 'blank' });
  return lines;
}

function cvLines(cv: ComposedCv): PdfLine[] {
  const lines = headerLines(cv);

  if (cv.summary.trim()) {
    lines.push({ text: cv.headings.summary.toUpperCase(), style: 'heading' });
    lines.push(...paragraphs(cv.summary));
    lines.push({ text: '', style: 'blank' });
  }

  if (cv.experiences.length > 0) {
    lines.push({ text: cv.headings.experience.toUpperCase(), style: 'heading' });
    for (const exp of cv.experiences) lines.push(...experienceLines(exp, true));
  }

  if (cv.skills.length > 0) {
    lines.push({ text: cv.headings.skills.toUpperCase(), style: 'heading' });
    for (const group of cv.skills) lines.push({ text: `${group.category}: ${group.items.join(', ')}`, style: 'body' });
    lines.push({ text: '', style: 'blank' });
  }

  if (cv.education.length > 0) {
    lines.push({ text: cv.headings.education.toUpperCase(), style: 'heading' });
    for (const edu of cv.education) {
      lines.push({ text: `${edu.degree}, ${edu.institution}`, style: 'body' });
      lines.push({ text: edu.period, style: 'body' });
    }
    lines.push({ text: '', style: 'blank' });
  }

  if (cv.languages.length > 0) {
    lines.push({ text: cv.headings.languages.toUpperCase(), style: 'heading' });
    lines.push({ text: cv.languages.join(', '), style: 'body' });
  }
  return lines;
}

function coverLetterLines(letter: ComposedCoverLetter): PdfLine[] {
  const lines = headerLines(letter);
  lines.push({ text: letter.greeting, style: 'body' }, { text: '', style: 'blank' });
  lines.push(...paragraphs(letter.opening), { text: '', style: 'blank' });
  for (const highlight of letter.highlights) lines.push(...experienceLines(highlight, false));
  lines.push(...paragraphs(letter.closing), { text: '', style: 'blank' });
  lines.push({ text: letter.signOff, style: 'body' }, { text: letter.header.name, style: 'body' });
  return lines;
}

/** Pure layout step: the document as styled lines, in render order. */
export function buildPdfLines(doc: ComposedDocument): PdfLine[] {
  return doc.kind === 'cv' ? cvLines(doc) : coverLetterLines(doc);
}

/** Letter-size PDF with the standard Helvetica fonts, wrapped lines and page numbers. */
export function renderPdf(composed: ComposedDocument): ArrayBuffer {
  const lines = buildPdfLines(composed);
  const doc = new jsPDF({ orientation: 'portrait', unit: 'pt', format: 'letter' });
  doc.setProperties({
    title: `${composed.header.name} - ${composed.kind === 'cv' ? 'CV' : 'Cover Letter'}`,
    author: composed.header.name,
  });

  let y = MARGIN_TOP;

  function applyStyle(style: PdfStyleConfig) {
    doc.setFont('helvetica', style.bold ? 'bold' : 'normal');
    doc.setFontSize(style.size);
  }

  function ensureRoom(height: number) {
    if (y + height <= PAGE_HEIGHT - MARGIN_BOTTOM) return;
    doc.addPage();
    y = MARGIN_TOP;
  }

  for (const line of lines) {
    if (line.style === 'blank') {
      y += 10;
      continue;
    }

    const style = STYLE_MAP[line.style];
    applyStyle(style);

    const baseX = MARGIN_LEFT + style.indent;
    const availableWidth = CONTENT_WIDTH - style.indent;
    const text = sanitizePdfText(line.text);
    if (!text) continue;

    if (line.style === 'bullet') {
      const prefixWidth = doc.getTextWidth('\u2022 ');
      const wrapped: string[] = doc.splitTextToSize(text, availableWidth - prefixWidth);
      wrapped.forEach((wrappedLine, i) => {
        ensureRoom(style.lineHeight);
        doc.text(i === 0 ? `\u2022 ${wrappedLine}` : wrappedLine, i === 0 ? baseX : baseX + prefixWidth, y);
        y += style.lineHeight;
      });
    } else {
      const wrapped: string[] = doc.splitTextToSize(text, availableWidth);
      for (const wrappedLine of wrapped) {
        ensureRoom(style.lineHeight);
        doc.text(wrappedLine, baseX, y);
        y += style.lineHeight;
      }
    }

    if (line.style === 'heading') y += 2;
  }

  const totalPages = doc.getNumberOfPages();
  if (totalPages > 1) {
    for (let i = 1; i <= totalPages; i++) {
      doc.setPage(i);
      doc.setFont('helvetica', 'normal');
      doc.setFontSize(9);
      const pageText = `${PAGE_LABEL[composed.language]} ${i} ${OF_LABEL[composed.language]} ${totalPages}`;
      const textWidth = doc.getTextWidth(pageText);
      doc.text(pageText, PAGE_WIDTH - MARGIN_RIGHT - textWidth, PAGE_HEIGHT - MARGIN_BOTTOM + 14);
    }
  }

  return doc.output('arraybuffer');
}

export function pdfFilename(composed: ComposedDocument): string {
  const slug = composed.header.name
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  const kind = composed.kind === 'cv' ? 'CV' : 'Cover_Letter';
  return `${slug || 'document'}_${kind}_${composed.language}.pdf`;
}
