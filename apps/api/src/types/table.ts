export type Scalar = string | number | boolean | null;

export type Row = Record<string, Scalar>;

export type Table = {
  columns: string[]; // union of row keys, first-seen order
  rows: Row[];
};

export type SourceKind = 'delimited-text' | 'spreadsheet' | 'document-text' | 'relational-rows';

export type UploadSource = {
  bytes: Uint8Array;
  name?: string;
  kind?: string; // tag as supplied by the transport, may name an unsupported kind
};

export type RowsSource = {
  kind: 'relational-rows';
  rows: Record<string, unknown>[];
  name?: string;
};

export type Source = UploadSource | RowsSource;

export type Metrics = Readonly<{
  completeness: number;
  consistency: number;
  overallIntegrity: number;
  validRecords: number;
  invalidRecords: number;
}>;

export type IngestIssue = {
  source: string;
  kind: string;
  message: string;
};
