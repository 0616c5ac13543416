/**
 * Registry Parser - Read the skills table out of the registry markdown
 *
 * The registry is the first table whose header has a name column and a
 * description column:
 *
 * | Skill | Description |
 * |-------|-------------|
 * | `rest-api-design` | Use when designing REST endpoints |
 */

import { marked, type Token, type Tokens } from 'marked';
import type { ParsedRegistry, RegistryProblem, SkillRegistryEntry } from './types.js';
import { isValidSkillName } from '../base/utils/validation.js';
import { RegistryError } from '../errors.js';

const NAME_HEADERS = new Set(['name', 'skill', 'skill name']);
const DESCRIPTION_HEADERS = new Set(['description', 'summary', 'when to use', 'trigger']);

function isTable(token: Token): token is Tokens.Table {
  return token.type === 'table';
}

/**
 * Reduce inline markdown in a table cell to plain text
 */
export function cellText(markdown: string): string {
  return markdown
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/`+/g, '')
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/__(.+?)__/g, '$1')
    .replace(/\*(.+?)\*/g, '$1')
    .replace(/(^|[^A-Za-z0-9])_(.+?)_(?![A-Za-z0-9])/g, '$1$2')
    .replace(/\s+/g, ' ')
    .trim();
}

function countLines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}

function findColumns(table: Tokens.Table): { name: number; description: number } | null {
  const headers = table.header.map((cell) => cellText(cell.text).toLowerCase());
  const name = headers.findIndex((header) => NAME_HEADERS.has(header));
  const description = headers.findIndex((header) => DESCRIPTION_HEADERS.has(header));
  return name >= 0 && description >= 0 ? { name, description } : null;
}

/**
 * Parse registry markdown into entries and row problems
 *
 * @param filePath - Used in error messages only
 * @throws RegistryError when no skills table is present
 */
export function parseRegistry(markdown: string, filePath: string): ParsedRegistry {
  const tokens = marked.lexer(markdown);

  let offset = 0;
  for (const token of tokens) {
    const startLine = offset + 1;
    offset += countLines(token.raw);

    if (!isTable(token)) continue;

    const columns = findColumns(token);
    if (!columns) continue;

    return collectRows(token, columns, startLine);
  }

  throw new RegistryError(
    `No skills table found in ${filePath}: expected a table with name and description columns`,
    filePath
  );
}

function collectRows(
  table: Tokens.Table,
  columns: { name: number; description: number },
  startLine: number
): ParsedRegistry {
  const entries: SkillRegistryEntry[] = [];
  const problems: RegistryProblem[] = [];
  const seen = new Map<string, number>();

  table.rows.forEach((row, index) => {
    // header and delimiter rows come first
    const line = startLine + 2 + index;
    const name = cellText(row[columns.name]?.text ?? '');
    const description = cellText(row[columns.description]?.text ?? '');

    if (!name) {
      problems.push({ code: 'MalformedRegistry', message: 'Row has an empty skill name', line });
      return;
    }

    if (!isValidSkillName(name)) {
      problems.push({
        code: 'InvalidSkillName',
        message: `Invalid skill name "${name}": must contain only lowercase letters, digits and dashes`,
        line,
        name,
      });
      return;
    }

    const firstLine = seen.get(name);
    if (firstLine !== undefined) {
      problems.push({
        code: 'DuplicateRegistryEntry',
        message: `Skill "${name}" is listed more than once (first on line ${firstLine})`,
        line,
        name,
      });
      return;
    }

    if (!description) {
      problems.push({
        code: 'MalformedRegistry',
        message: `Skill "${name}" has an empty description`,
        line,
        name,
      });
      return;
    }

    seen.set(name, line);
    entries.push({ name, description, line });
  });

  return { entries, problems };
}
