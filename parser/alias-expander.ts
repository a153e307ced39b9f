/**
 * Alias Expander
 *
 * User-defined command macros. A definition is either `name=value` or
 * `name{n}=value`; the value refers to its arguments as `\1` .. `\n`.
 * Expansion is textual and runs over the comment before it is tokenized.
 */

import {
  DiagnosticCategory,
  DiagnosticSeverity,
  ParseErrorCode,
  type DiagnosticSink
} from './parser-interfaces.js';
import { isCommandEscapeChar } from './entities.js';
import { lineOfOffset } from './parser-utils.js';

const MAX_EXPANSION_DEPTH = 20;

const definitionPattern = /^([a-z_A-Z][a-z_A-Z0-9]*)(?:\{([0-9]*)\})?[ \t]*=(.*)$/s;

export interface AliasDefinition {
  name: string;
  argCount: number;
  value: string;
}

function aliasKey(name: string, argCount: number): string {
  return argCount > 0 ? `${name}{${argCount}}` : name;
}

/**
 * `\n` inside an alias value stands for a line break, even when text follows
 * directly; only `\note`, `\name`, `\namespace` and `\nosubgrouping` are kept.
 */
export function escapeAliasValue(value: string): string {
  return value.replace(/\\n(?!ote|ame|osubgrouping)/g, '\\_linebr ');
}

/**
 * Parse one `name=value` / `name{n}=value` definition
 */
export function parseAliasDefinition(definition: string): AliasDefinition | undefined {
  const match = definitionPattern.exec(definition.trim());
  if (!match) return undefined;
  const argCount = match[2] ? parseInt(match[2], 10) : 0;
  return { name: match[1], argCount, value: escapeAliasValue(match[3].trim()) };
}

/**
 * Read-only alias lookup built once during setup
 */
export class AliasTable {
  private readonly entries: ReadonlyMap<string, string>;
  private readonly names: ReadonlySet<string>;

  constructor(definitions: readonly AliasDefinition[]) {
    const entries = new Map<string, string>();
    const names = new Set<string>();
    for (const def of definitions) {
      entries.set(aliasKey(def.name, def.argCount), def.value);
      names.add(def.name);
    }
    this.entries = entries;
    this.names = names;
  }

  /**
   * Build a table from configuration lines, reporting malformed ones
   */
  static fromConfig(lines: readonly string[], sink?: DiagnosticSink, fileName = '<config>'): AliasTable {
    const definitions: AliasDefinition[] = [];
    lines.forEach((line, index) => {
      const def = parseAliasDefinition(line);
      if (def) {
        definitions.push(def);
      } else {
        sink?.report({
          severity: DiagnosticSeverity.Warning,
          category: DiagnosticCategory.Alias,
          code: ParseErrorCode.INVALID_ALIAS,
          message: `Alias format "${line}" is invalid, use "name=value" or "name{n}=value", where n is the number of arguments`,
          subject: line,
          fileName,
          line: index + 1,
          pos: 0,
          end: 0
        });
      }
    });
    return new AliasTable(definitions);
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(name: string, argCount: number): string | undefined {
    return this.entries.get(aliasKey(name, argCount));
  }

  hasName(name: string): boolean {
    return this.names.has(name);
  }

  /**
   * Expand every alias reference in `text`
   */
  expand(text: string, sink?: DiagnosticSink, fileName = ''): string {
    // nested references are reported at the outermost reference in `text`
    const report = (code: ParseErrorCode, message: string, subject: string, pos: number) => {
      sink?.report({
        severity: DiagnosticSeverity.Warning,
        category: DiagnosticCategory.Alias,
        code,
        message,
        subject,
        fileName,
        line: lineOfOffset(text, pos),
        pos,
        end: pos
      });
    };
    return this.expandRecursive(text, [], report, undefined);
  }

  private expandRecursive(
    text: string,
    active: string[],
    report: (code: ParseErrorCode, message: string, subject: string, pos: number) => void,
    origin: number | undefined
  ): string {
    let result = '';
    let i = 0;
    while (i < text.length) {
      const ch = text[i];
      if (ch !== '\\' && ch !== '@') {
        result += ch;
        i++;
        continue;
      }

      const next = text.charAt(i + 1);
      if (isCommandEscapeChar(next)) {
        result += ch + next;
        i += 2;
        continue;
      }

      const nameMatch = /^[a-zA-Z_][a-zA-Z0-9_]*/.exec(text.slice(i + 1));
      if (!nameMatch) {
        result += ch;
        i++;
        continue;
      }

      const name = nameMatch[0];
      let end = i + 1 + name.length;
      let args: string[] | undefined;
      if (text.charAt(end) === '{' && this.names.has(name)) {
        const parsed = splitAliasArguments(text, end);
        if (parsed) {
          args = parsed.args;
          end = parsed.end;
        }
      }

      const argCount = args ? args.length : 0;
      let value = this.lookup(name, argCount);
      if (value === undefined && args) {
        if (this.lookup(name, 0) !== undefined && !this.hasArgumentForm(name)) {
          // plain alias followed by an unrelated brace group
          value = this.lookup(name, 0);
          args = undefined;
          end = i + 1 + name.length;
        } else {
          report(ParseErrorCode.ALIAS_ARGUMENT_COUNT,
            `Alias \\${name} called with ${argCount} argument(s), no matching definition`, name, origin ?? i);
        }
      }

      if (value === undefined) {
        result += text.slice(i, end);
        i = end;
        continue;
      }

      const key = aliasKey(name, args ? args.length : 0);
      if (active.includes(key) || active.length >= MAX_EXPANSION_DEPTH) {
        report(ParseErrorCode.ALIAS_RECURSION, `Recursive expansion of alias \\${name} stopped`, name, origin ?? i);
        result += text.slice(i, end);
        i = end;
        continue;
      }

      const substituted = args ? substituteArguments(value, args) : value;
      result += this.expandRecursive(substituted, [...active, key], report, origin ?? i);
      i = end;
    }
    return result;
  }

  private hasArgumentForm(name: string): boolean {
    for (const key of this.entries.keys()) {
      if (key.startsWith(`${name}{`)) return true;
    }
    return false;
  }
}

/**
 * Split `{a,b{c},d\,e}` starting at `open` into its top-level arguments
 */
export function splitAliasArguments(text: string, open: number): { args: string[]; end: number } | undefined {
  const args: string[] = [];
  let depth = 0;
  let current = '';
  for (let i = open + 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\' && (text[i + 1] === ',' || text[i + 1] === '{' || text[i + 1] === '}')) {
      current += text[i + 1];
      i++;
    } else if (ch === '{') {
      depth++;
      current += ch;
    } else if (ch === '}') {
      if (depth === 0) {
        args.push(current);
        return { args, end: i + 1 };
      }
      depth--;
      current += ch;
    } else if (ch === ',' && depth === 0) {
      args.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  return undefined;
}

/**
 * Replace `\1` .. `\n` with the given arguments
 */
export function substituteArguments(value: string, args: readonly string[]): string {
  return value.replace(/\\([0-9]+)/g, (whole, digits: string) => {
    const index = parseInt(digits, 10);
    return index >= 1 && index <= args.length ? args[index - 1] : whole;
  });
}
