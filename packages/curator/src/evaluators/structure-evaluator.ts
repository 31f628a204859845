import type { HeadingCount, StructureReport } from '@silverforge/model';

/**
 * Table lines made only of pipes, dashes, colons and whitespace
 */
const TABLE_SEPARATOR = /^\|[\s\-:|]+\|$/;

const EQUATION_DELIMITER = /\$\$/g;

const MAX_COUNTED_DEPTH = 4;

interface CheckResult {
  valid: boolean;
  issue?: string;
}

/**
 * StructureEvaluator
 *
 * Rule-based checks on Markdown structure:
 * - Heading order: no forward jump of more than one level
 * - Tables: every table line has the pipe count of the first table line
 * - Display equations: `$$` delimiters come in pairs
 *
 * Never throws; problems are reported as issue strings.
 */
export class StructureEvaluator {
  evaluate(markdown: string): StructureReport {
    const lines = markdown.split('\n');
    const issues: string[] = [];

    const { headingCount, depths } = this.collectHeadings(lines);
    const headingOrder = this.checkHeadingOrder(depths);

    const tableLines = lines.filter((line) => line.trim().startsWith('|'));
    const tableCount = this.countTables(lines);
    const tables = this.checkTables(tableLines);

    const delimiterCount = markdown.match(EQUATION_DELIMITER)?.length ?? 0;
    const equationValid = delimiterCount % 2 === 0;

    for (const check of [headingOrder, tables]) {
      if (check.issue) issues.push(check.issue);
    }
    if (!equationValid) {
      issues.push('Unbalanced display equation delimiters ($$)');
    }

    return {
      headingCount,
      headingOrderValid: headingOrder.valid,
      tableCount,
      tableValid: tables.valid,
      equationCount: Math.floor(delimiterCount / 2),
      equationValid,
      issues,
      pass: headingOrder.valid && tables.valid && equationValid,
    };
  }

  /**
   * Depths 5 and deeper are ignored
   */
  private collectHeadings(lines: string[]): {
    headingCount: HeadingCount;
    depths: number[];
  } {
    const headingCount: HeadingCount = { h1: 0, h2: 0, h3: 0, h4: 0 };
    const depths: number[] = [];

    for (const line of lines) {
      const marker = /^#+/.exec(line);
      if (!marker) continue;

      const depth = marker[0].length;
      if (depth > MAX_COUNTED_DEPTH) continue;

      switch (depth) {
        case 1:
          headingCount.h1++;
          break;
        case 2:
          headingCount.h2++;
          break;
        case 3:
          headingCount.h3++;
          break;
        default:
          headingCount.h4++;
      }
      depths.push(depth);
    }

    return { headingCount, depths };
  }

  /**
   * Only forward jumps are checked; stops at the first violation
   */
  private checkHeadingOrder(depths: number[]): CheckResult {
    for (let i = 1; i < depths.length; i++) {
      if (depths[i] > depths[i - 1] + 1) {
        return {
          valid: false,
          issue: `Heading level jump: H${depths[i - 1]} -> H${depths[i]}`,
        };
      }
    }
    return { valid: true };
  }

  /**
   * A table is a run of consecutive table lines
   */
  private countTables(lines: string[]): number {
    let count = 0;
    let inTable = false;

    for (const line of lines) {
      if (line.trim().startsWith('|')) {
        if (!inTable) count++;
        inTable = true;
      } else {
        inTable = false;
      }
    }

    return count;
  }

  /**
   * Pipe counts are compared across all table lines of the document, not
   * per table, so two tables with different widths are reported invalid.
   */
  private checkTables(tableLines: string[]): CheckResult {
    if (tableLines.length === 0) return { valid: true };

    const expected = this.countPipes(tableLines[0]);

    for (const line of tableLines.slice(1)) {
      const pipes = this.countPipes(line);
      if (pipes === expected) continue;

      const trimmed = line.trim();
      if (trimmed === '|---|' || TABLE_SEPARATOR.test(trimmed)) continue;

      return {
        valid: false,
        issue: `Table column count mismatch: ${expected} vs ${pipes}`,
      };
    }

    return { valid: true };
  }

  private countPipes(line: string): number {
    return line.split('|').length - 1;
  }
}

/**
 * Check heading order, table shape and equation delimiters of a Markdown document
 */
export function evaluateStructure(markdown: string): StructureReport {
  return new StructureEvaluator().evaluate(markdown);
}
