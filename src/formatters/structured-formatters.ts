import type { LogRecord } from '../types/record';
import { safeJson, stringifyValue } from '../utils/serialize';
import { BaseFormatter, RECORD_FIELD_NAMES, recordFields } from './base-formatter';
import type { RecordFields } from './base-formatter';

export class JsonFormatter extends BaseFormatter {
  constructor(private readonly space?: number) {
    super();
  }

  format(record: LogRecord): string {
    return safeJson(recordFields(record), this.space);
  }
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

function escapeMarkup(text: string): string {
  return text.replace(/[&<>"']/g, ch => XML_ESCAPES[ch] ?? ch);
}

function xmlTag(key: string): string {
  const cleaned = key.replace(/[^A-Za-z0-9_.-]/g, '_');
  return /^[A-Za-z_]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

export class XmlFormatter extends BaseFormatter {
  format(record: LogRecord): string {
    const fields = recordFields(record);
    const parts: string[] = ['<record>'];
    for (const [key, value] of scalarEntries(fields)) {
      parts.push(`<${key}>${escapeMarkup(value)}</${key}>`);
    }
    parts.push('<tags>');
    for (const tag of fields.tags) {
      parts.push(`<tag>${escapeMarkup(tag)}</tag>`);
    }
    parts.push('</tags>', '<extra>');
    for (const [key, value] of Object.entries(fields.extra)) {
      const tag = xmlTag(key);
      parts.push(`<${tag}>${escapeMarkup(stringifyValue(value))}</${tag}>`);
    }
    parts.push('</extra>', '</record>');
    return parts.join('');
  }
}

function yamlScalar(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  // JSON strings are valid YAML double-quoted scalars
  return JSON.stringify(stringifyValue(value));
}

export class YamlFormatter extends BaseFormatter {
  format(record: LogRecord): string {
    const fields = recordFields(record);
    const lines: string[] = [];
    for (const [key, value] of scalarEntries(fields)) {
      lines.push(`${key}: ${key === 'level_value' ? value : yamlScalar(value)}`);
    }
    if (fields.parent === null) {
      lines.push('parent: null');
    }
    lines.push(
      fields.tags.length === 0
        ? 'tags: []'
        : ['tags:', ...fields.tags.map(tag => `  - ${yamlScalar(tag)}`)].join('\n')
    );
    const extra = Object.entries(fields.extra);
    lines.push(
      extra.length === 0
        ? 'extra: {}'
        : [
            'extra:',
            ...extra.map(([key, value]) => `  ${JSON.stringify(key)}: ${yamlScalar(value)}`),
          ].join('\n')
    );
    return lines.join('\n');
  }
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * One CSV row per record; columns follow {@link CsvFormatter.header}.
 */
export class CsvFormatter extends BaseFormatter {
  static readonly header = RECORD_FIELD_NAMES.join(',');

  format(record: LogRecord): string {
    const fields = recordFields(record);
    return RECORD_FIELD_NAMES.map(name => {
      const value = fields[name];
      if (name === 'tags') {
        return csvCell(fields.tags.join(';'));
      }
      if (name === 'extra') {
        return csvCell(safeJson(fields.extra));
      }
      return csvCell(value === null ? '' : stringifyValue(value));
    }).join(',');
  }
}

export class HtmlFormatter extends BaseFormatter {
  format(record: LogRecord): string {
    const fields = recordFields(record);
    const cells = RECORD_FIELD_NAMES.map(name => {
      const value =
        name === 'tags'
          ? fields.tags.join(', ')
          : name === 'extra'
            ? safeJson(fields.extra)
            : stringifyValue(fields[name] ?? '');
      return `<td class="${name}">${escapeMarkup(value)}</td>`;
    });
    return `<tr class="level-${fields.level.toLowerCase()}">${cells.join('')}</tr>`;
  }
}

export class MarkdownFormatter extends BaseFormatter {
  format(record: LogRecord): string {
    const fields = recordFields(record);
    const escape = (text: string) =>
      text.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>');
    const cells = RECORD_FIELD_NAMES.map(name => {
      if (name === 'tags') {
        return escape(fields.tags.join(', '));
      }
      if (name === 'extra') {
        return escape(safeJson(fields.extra));
      }
      return escape(stringifyValue(fields[name] ?? ''));
    });
    return `| ${cells.join(' | ')} |`;
  }
}

function scalarEntries(fields: RecordFields): Array<[string, string]> {
  const entries: Array<[string, string]> = [
    ['time', fields.time],
    ['name', fields.name],
    ['prefix', fields.prefix],
    ['level', fields.level],
    ['level_value', String(fields.level_value)],
    ['message', fields.message],
  ];
  if (fields.parent !== null) {
    entries.push(['parent', fields.parent]);
  }
  return entries;
}
