import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';

import { loadConfig, type AppConfig } from './config';
import { describeError } from './errors';
import { createDatabaseCollaborator, type RelationalCollaborator } from './ingest/db';
import type { PageExtractor } from './ingest/document';
import { runPipeline } from './pipeline';
import { consoleChannel, createCollectingChannel, type ErrorChannel } from './reporting';
import type { Source } from './types/table';
import { isRecord } from './utils/scalar';

export type AppDeps = {
  config?: AppConfig;
  database?: RelationalCollaborator;
  extractPages?: PageExtractor;
};

const DATA_URL = /^data:[^,]*;base64,([\s\S]*)$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

// room for the JSON around the encoded files
const ENVELOPE_BYTES = 64 * 1024;

/** Largest `/encoded` body: every allowed file at the per-file limit, base64-encoded. */
export const encodedBodyLimit = ({ maxUploadBytes, maxFiles }: AppConfig) =>
  Math.ceil((maxUploadBytes * 4) / 3) * maxFiles + ENVELOPE_BYTES;

const isTrueFlag = (value: unknown) => value === true || String(value).toLowerCase() === 'true';

/** Decodes a `data:<type>;base64,<payload>` URL as produced by browser file inputs. */
export const decodeDataUrl = (contents: string): Buffer | null => {
  const match = DATA_URL.exec(contents);
  if (!match) return null;
  const payload = match[1].replace(/\s+/g, '');
  if (payload.length % 4 !== 0 || !BASE64.test(payload)) return null;
  return Buffer.from(payload, 'base64');
};

const decodeEncodedFiles = (files: unknown[], maxUploadBytes: number, channel: ErrorChannel): Source[] => {
  const sources: Source[] = [];
  files.forEach((entry, index) => {
    const name = isRecord(entry) && typeof entry.filename === 'string' ? entry.filename : undefined;
    const contents = isRecord(entry) ? entry.contents : undefined;
    const bytes = typeof contents === 'string' ? decodeDataUrl(contents) : null;
    if (!bytes) {
      channel.report({ source: name || `file ${index + 1}`, kind: 'upload', message: 'contents are not a base64 data URL' });
      return;
    }
    if (bytes.length > maxUploadBytes) {
      channel.report({
        source: name || `file ${index + 1}`,
        kind: 'upload',
        message: `file exceeds the upload limit of ${maxUploadBytes} bytes`
      });
      return;
    }
    sources.push({ bytes, name });
  });
  return sources;
};

export const createApp = (deps: AppDeps = {}) => {
  const config = deps.config ?? loadConfig();
  const database = deps.database ?? (config.database ? createDatabaseCollaborator(config.database) : undefined);

  const app = express();
  const upload = multer({ limits: { fileSize: config.maxUploadBytes, files: config.maxFiles } });

  app.use(cors());
  app.use(express.json({ limit: encodedBodyLimit(config) }));

  const computeMetrics = async (sources: Source[], includeDatabase: boolean, channel = createCollectingChannel(consoleChannel)) => {
    const result = await runPipeline(sources, {
      includeDatabase,
      database,
      channel,
      delimiter: config.delimiter,
      extractPages: deps.extractPages
    });
    return { ...result, issues: channel.issues };
  };

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/metrics', upload.array('files'), async (req, res) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      const includeDatabase = isTrueFlag(req.query.includeDatabase) || isTrueFlag(req.body?.includeDatabase);
      const sources: Source[] = files.map(file => ({ bytes: file.buffer, name: file.originalname }));

      res.json(await computeMetrics(sources, includeDatabase));
    } catch (err) {
      res.status(500).json({ error: describeError(err) || 'Metrics calculation failed' });
    }
  });

  app.post('/api/metrics/encoded', async (req, res) => {
    try {
      const body: unknown = req.body;
      const files = isRecord(body) ? body.files : undefined;
      if (!Array.isArray(files)) {
        return res.status(400).json({ error: 'files must be an array of { filename, contents }' });
      }
      if (files.length > config.maxFiles) {
        return res.status(400).json({ error: `at most ${config.maxFiles} files per request` });
      }

      const channel = createCollectingChannel(consoleChannel);
      const sources = decodeEncodedFiles(files, config.maxUploadBytes, channel);
      const includeDatabase = isRecord(body) && isTrueFlag(body.includeDatabase);

      res.json(await computeMetrics(sources, includeDatabase, channel));
    } catch (err) {
      res.status(500).json({ error: describeError(err) || 'Metrics calculation failed' });
    }
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      return res.status(status).json({ error: err.message });
    }
    res.status(500).json({ error: describeError(err) });
  });

  return app;
};
