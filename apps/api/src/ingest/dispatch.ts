import { describeError } from '../errors';
import { consoleChannel, type ErrorChannel } from '../reporting';
import type { Source, SourceKind, Table, UploadSource } from '../types/table';
import { parseDelimited } from './csv';
import { extractPdfPages, parsePdf, parsePlainText, type PageExtractor } from './document';
import { parseJsonRows, tableFromRows } from './rows';
import { parseSpreadsheet } from './spreadsheet';

const SOURCE_KINDS: readonly string[] = ['delimited-text', 'spreadsheet', 'document-text', 'relational-rows'];

const FILE_FORMATS = {
  csv: 'delimited-text',
  tsv: 'delimited-text',
  xlsx: 'spreadsheet',
  xls: 'spreadsheet',
  pdf: 'document-text',
  txt: 'document-text'
} as const satisfies Record<string, SourceKind>;

export type FileFormat = keyof typeof FILE_FORMATS;

export type ResolvedSource = {
  kind: SourceKind;
  format: FileFormat | null;
};

export type DispatchOptions = {
  channel?: ErrorChannel;
  delimiter?: string;
  extractPages?: PageExtractor;
};

const PDF_MAGIC = '%PDF-';

export const isSourceKind = (value: string): value is SourceKind => SOURCE_KINDS.includes(value);

const isFileFormat = (value: string): value is FileFormat => Object.hasOwn(FILE_FORMATS, value);

const formatOf = (name?: string): FileFormat | null => {
  const match = /\.([^./\\]+)$/.exec(name?.toLowerCase() ?? '');
  return match && isFileFormat(match[1]) ? match[1] : null;
};

export const displayName = (source: Source, index: number) => source.name || `source ${index + 1}`;

/** An explicit kind tag wins over the filename; null means the source is not supported. */
export const resolveSource = (source: UploadSource): ResolvedSource | null => {
  const format = formatOf(source.name);
  if (source.kind !== undefined) {
    if (!isSourceKind(source.kind)) return null;
    return { kind: source.kind, format: format && FILE_FORMATS[format] === source.kind ? format : null };
  }
  return format ? { kind: FILE_FORMATS[format], format } : null;
};

const looksLikePdf = (bytes: Uint8Array) =>
  bytes.length >= PDF_MAGIC.length && Buffer.from(bytes.subarray(0, PDF_MAGIC.length)).toString('latin1') === PDF_MAGIC;

const parseSource = async (
  bytes: Uint8Array,
  name: string,
  { kind, format }: ResolvedSource,
  options: DispatchOptions
): Promise<Table> => {
  switch (kind) {
    case 'delimited-text':
      return parseDelimited(bytes, name, { delimiter: format === 'tsv' ? '\t' : options.delimiter });
    case 'spreadsheet':
      return parseSpreadsheet(bytes, name, format === 'xlsx' || format === 'xls' ? format : 'any');
    case 'document-text':
      if (format === 'txt' || (format === null && !looksLikePdf(bytes))) return parsePlainText(bytes, name);
      return parsePdf(bytes, name, options.extractPages ?? extractPdfPages);
    case 'relational-rows':
      return parseJsonRows(bytes, name);
  }
};

/**
 * Routes each source to its parser. Unsupported sources are dropped silently,
 * sources that fail to parse are reported to the channel and dropped.
 * Output order follows input order.
 */
export const dispatch = async (sources: Source[], options: DispatchOptions = {}): Promise<Table[]> => {
  const channel = options.channel ?? consoleChannel;

  const tables = await Promise.all(
    sources.map(async (source, index): Promise<Table | null> => {
      if ('rows' in source) return tableFromRows(source.rows);

      const resolved = resolveSource(source);
      if (!resolved) return null;

      const name = displayName(source, index);
      try {
        return await parseSource(source.bytes, name, resolved, options);
      } catch (err) {
        channel.report({ source: name, kind: resolved.kind, message: describeError(err) });
        return null;
      }
    })
  );

  return tables.filter((table): table is Table => table !== null);
};
