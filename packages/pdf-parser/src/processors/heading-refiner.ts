/**
 * Heading depth assigned by the refiner (1 = document title)
 */
export type HeadingDepth = 1 | 2 | 3 | 4;

/**
 * A content-based rule that fixes the depth of a heading
 */
export interface HeadingRule {
  name: string;
  depth: HeadingDepth;
  matches: (text: string) => boolean;
}

/**
 * Canonical academic section names that always become depth 2
 */
export const SECTION_NAMES: readonly string[] = [
  'abstract',
  'introduction',
  'conclusion',
  'references',
  'acknowledgments',
  'acknowledgements',
  'appendix',
  'related work',
  'background',
  'methodology',
  'methods',
  'results',
  'discussion',
  'experiments',
  'evaluation',
];

/**
 * Depth rules, evaluated top to bottom; the first match wins.
 *
 * Headings matching none of them become the title (depth 1) if no title
 * has been seen yet, and depth 2 otherwise.
 */
export const HEADING_RULES: readonly HeadingRule[] = [
  {
    name: 'sub-subsection number',
    depth: 4,
    matches: (text) => /^\d+\.\d+\.\d+/.test(text),
  },
  {
    name: 'subsection number',
    depth: 3,
    matches: (text) => /^\d+\.\d+/.test(text),
  },
  {
    name: 'section number',
    depth: 2,
    matches: (text) => /^\d+\.?\s/.test(text),
  },
  {
    name: 'section name',
    depth: 2,
    matches: (text) => SECTION_NAMES.includes(text.toLowerCase()),
  },
];

const HEADING_LINE = /^(#+)\s*(.+)$/s;

/**
 * HeadingRefiner
 *
 * Rebuilds heading hierarchy in Markdown whose headings were flattened to a
 * single level. Depth is derived from each heading's text (numeric prefixes
 * like `3.1` and canonical section names), never from its existing marker,
 * so refining already-structured Markdown can change it.
 *
 * Line count and order are preserved; only heading markers change.
 */
export class HeadingRefiner {
  /**
   * Refine heading depths of a Markdown document
   *
   * @example
   * ```typescript
   * HeadingRefiner.refine('# My Paper\n# 1 Introduction\n# 1.1 Scope');
   * // '# My Paper\n## 1 Introduction\n### 1.1 Scope'
   * ```
   */
  static refine(markdown: string): string {
    let titleFound = false;

    return markdown
      .split('\n')
      .map((line) => {
        if (!line.startsWith('#')) return line;

        const match = HEADING_LINE.exec(line);
        const content = match?.[2].trim();
        if (!content) return line;

        const depth = this.detectDepth(content, titleFound);
        if (depth === 1) titleFound = true;

        return `${'#'.repeat(depth)} ${content}`;
      })
      .join('\n');
  }

  /**
   * Decide the depth of a heading from its text
   *
   * @param text - Heading text without the `#` marker
   * @param titleFound - Whether a depth-1 heading was already assigned
   */
  static detectDepth(text: string, titleFound: boolean): HeadingDepth {
    const trimmed = text.trim();
    const rule = HEADING_RULES.find((r) => r.matches(trimmed));

    if (rule) return rule.depth;
    return titleFound ? 2 : 1;
  }
}

/**
 * Reassign heading depths (1-4) of flat Markdown
 */
export function refineHeadings(markdown: string): string {
  return HeadingRefiner.refine(markdown);
}
