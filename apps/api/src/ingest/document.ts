import { extractText, getDocumentProxy } from 'unpdf';
import { FormatError, describeError } from '../errors';
import type { Table } from '../types/table';
import { decodeUtf8 } from '../utils/text';

const KIND = 'document-text' as const;

export const EXTRACTED_TEXT_COLUMN = 'Extracted Text';

/** Returns the text of each page, in page order. */
export type PageExtractor = (bytes: Uint8Array) => Promise<string[]>;

export const extractPdfPages: PageExtractor = async bytes => {
  // pdf.js takes ownership of the buffer it is given
  const pdf = await getDocumentProxy(new Uint8Array(bytes));
  const { text } = await extractText(pdf, { mergePages: false });
  return Array.isArray(text) ? text : [text];
};

const textTable = (text: string): Table => ({
  columns: [EXTRACTED_TEXT_COLUMN],
  rows: [{ [EXTRACTED_TEXT_COLUMN]: text }]
});

export const parsePdf = async (
  bytes: Uint8Array,
  name: string,
  extractPages: PageExtractor = extractPdfPages
): Promise<Table> => {
  try {
    const pages = await extractPages(bytes);
    return textTable(pages.join('\n'));
  } catch (err) {
    if (err instanceof FormatError) throw err;
    throw new FormatError(KIND, name, describeError(err), { cause: err });
  }
};

export const parsePlainText = (bytes: Uint8Array, name: string): Table => textTable(decodeUtf8(bytes, KIND, name));
