import { readText } from '../utils/fs.js';

export interface PrTemplate {
  /** Normalised section headings, in template order, without duplicates. */
  sections: string[];
  /** Checklist item labels as written in the template. */
  checklist: string[];
}

export interface TemplateAdherence {
  sectionsMatched: number;
  sectionsTotal: number;
  checkboxesChecked: number;
  checkboxesTotal: number;
  /** sectionsMatched / sectionsTotal; 0 when the template has no sections. */
  adherence: number;
}

const HEADING_RE = /^#{1,6}\s+(.+)$/;
const CHECKBOX_RE = /^[-*+]\s+\[([ xX])\]\s*(.*)$/;

export function parseTemplate(markdown: string): PrTemplate {
  const lines = contentLines(markdown);
  const sections: string[] = [];
  const checklist: string[] = [];

  for (const line of lines) {
    const h = HEADING_RE.exec(line);
    if (h) {
      const heading = normalizeHeading(h[1]);
      if (heading && !sections.includes(heading)) sections.push(heading);
      continue;
    }
    const c = CHECKBOX_RE.exec(line);
    if (c) checklist.push(c[2].trim());
  }

  return { sections, checklist };
}

export function scoreBody(template: PrTemplate, body: string | null | undefined): TemplateAdherence {
  const lines = contentLines(body ?? '');
  const headings = new Set<string>();
  let checkboxesTotal = 0;
  let checkboxesChecked = 0;

  for (const line of lines) {
    const h = HEADING_RE.exec(line);
    if (h) {
      headings.add(normalizeHeading(h[1]));
      continue;
    }
    const c = CHECKBOX_RE.exec(line);
    if (c) {
      checkboxesTotal += 1;
      if (c[1] !== ' ') checkboxesChecked += 1;
    }
  }

  const sectionsMatched = template.sections.filter((s) => headings.has(s)).length;
  const sectionsTotal = template.sections.length;
  return {
    sectionsMatched,
    sectionsTotal,
    checkboxesChecked,
    checkboxesTotal,
    adherence: sectionsTotal === 0 ? 0 : sectionsMatched / sectionsTotal
  };
}

export async function loadTemplate(path: string): Promise<PrTemplate> {
  return parseTemplate(await readText(path));
}

export function normalizeHeading(raw: string): string {
  return raw
    .replace(/\s+#+\s*$/, '')
    .replace(/[*_`]/g, '')
    .trim()
    .replace(/:$/, '')
    .trim()
    .toLowerCase();
}

// HTML comments are the usual way templates carry instructions; they never count.
function contentLines(markdown: string): string[] {
  return markdown
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
}
