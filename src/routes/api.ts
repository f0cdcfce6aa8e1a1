import { once } from 'node:events';
import fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import type { Application, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import type { AuditEvent, AuditLogger } from '../audit-log.js';
import { describeActor } from '../auth.js';
import { BadRequestError, errorMessage, NotFoundError, wrapAsync } from '../errors.js';
import type { FileIndexManager } from '../file-index.js';
import { isMissing, type FileOperations } from '../file-ops.js';
import type { MetricsRegistry } from '../metrics.js';

const DOWNLOAD_HIGH_WATER_MARK = 64 * 1024;

interface ApiRouteDeps {
  index: FileIndexManager;
  fileOps: FileOperations;
  auditLogger: AuditLogger;
  metrics: MetricsRegistry;
  adminOnly: RequestHandler;
}

function readStringQuery(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return typeof value[0] === 'string' ? value[0] : undefined;
  }
  return undefined;
}

function readBodyField(body: unknown, key: string): unknown {
  if (!body || typeof body !== 'object') {
    return undefined;
  }
  return (body as Record<string, unknown>)[key];
}

/** The `*` segment of `/api/<op>/*`; absent for `/api/<op>` itself. */
export function readWildcardPath(req: Request): string {
  const value: unknown = req.params[0];
  return typeof value === 'string' ? value : '';
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

/** Resolves once the file is open, so a vanished file still gets a JSON error. */
async function openReadStream(absolutePath: string): Promise<fs.ReadStream> {
  const stream = fs.createReadStream(absolutePath, { highWaterMark: DOWNLOAD_HIGH_WATER_MARK });
  try {
    await once(stream, 'ready');
  } catch (error) {
    stream.destroy();
    if (isMissing(error)) {
      throw new NotFoundError('File not found');
    }
    throw error;
  }
  return stream;
}

function withOptionalPath(route: string): string[] {
  return [route, `${route}/*`];
}

export function registerApiRoutes(app: Application, deps: ApiRouteDeps): void {
  const { index, fileOps, auditLogger, metrics, adminOnly } = deps;

  const auditFsEvent = (
    res: Response,
    event: AuditEvent,
    resource: string,
    outcome: 'success' | 'failure',
    metadata: Record<string, unknown> = {}
  ): void => {
    auditLogger.log({
      event,
      actor: describeActor(res),
      resource,
      outcome,
      metadata
    });
  };

  const uploadSingle: RequestHandler = multer({
    // multipart filenames arrive as UTF-8; busboy would read them as latin1
    defParamCharset: 'utf8',
    storage: multer.diskStorage({
      destination: (req, _file, callback) => {
        fileOps.prepareUploadDirectory(readWildcardPath(req)).then(
          (dir) => callback(null, dir),
          (error: unknown) => callback(toError(error), '')
        );
      },
      filename: (_req, file, callback) => {
        try {
          callback(null, fileOps.uploadFileName(file.originalname));
        } catch (error) {
          callback(toError(error), '');
        }
      }
    })
  }).single('file');

  const receiveUpload = (req: Request, res: Response): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      uploadSingle(req, res, (error?: unknown) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

  app.get('/api/index', (_req: Request, res: Response) => {
    res.json(index.current());
  });

  app.post(
    '/api/index/rebuild',
    wrapAsync(async (_req: Request, res: Response) => {
      const snapshot = await index.rebuild();
      auditLogger.log({
        event: 'index.rebuild',
        actor: describeActor(res),
        outcome: 'success',
        metadata: { totalFiles: snapshot.totalFiles, totalSize: snapshot.totalSize }
      });
      res.json({
        message: 'Index rebuilt successfully',
        totalFiles: snapshot.totalFiles,
        totalSize: snapshot.totalSize
      });
    })
  );

  app.get('/api/search', (req: Request, res: Response) => {
    const query = readStringQuery(req.query.q) ?? '';
    const rawLimit = readStringQuery(req.query.limit);
    const limit = rawLimit === undefined ? undefined : Number.parseInt(rawLimit, 10);
    res.json({
      query,
      results: index.search(query, limit)
    });
  });

  app.get(
    withOptionalPath('/api/browse'),
    wrapAsync(async (req: Request, res: Response) => {
      res.json(await fileOps.browse(readWildcardPath(req)));
    })
  );

  app.get(
    withOptionalPath('/api/download'),
    wrapAsync(async (req: Request, res: Response) => {
      const requestPath = readWildcardPath(req);
      let resource = requestPath;
      try {
        const target = await fileOps.openDownload(requestPath);
        resource = target.relativePath;
        const source = await openReadStream(target.absolutePath);
        res.setHeader('Content-Type', 'application/octet-stream');
        res.setHeader('Content-Length', String(target.size));
        res.setHeader('Cache-Control', 'no-store');
        res.setHeader('Content-Disposition', contentDisposition(target.name));
        await pipeline(source, res);
        auditFsEvent(res, 'fs.download', resource, 'success', { bytes: target.size });
      } catch (error) {
        auditFsEvent(res, 'fs.download', resource, 'failure', { reason: errorMessage(error) });
        if (res.headersSent || res.destroyed) {
          // client went away or the read failed mid-stream
          res.destroy();
          return;
        }
        throw error;
      }
    })
  );

  app.post(
    withOptionalPath('/api/upload'),
    wrapAsync(async (req: Request, res: Response) => {
      const requestPath = readWildcardPath(req);
      try {
        // reject the path before the body is read or anything is created
        fileOps.resolve(requestPath);
        await receiveUpload(req, res);
        const file = req.file;
        if (!file) {
          throw new BadRequestError('No file provided');
        }
        const relativePath = fileOps.completeUpload(file.path);
        auditFsEvent(res, 'fs.upload', relativePath, 'success', { bytes: file.size });
        res.json({
          message: 'File uploaded successfully',
          path: relativePath,
          size: file.size
        });
      } catch (error) {
        auditFsEvent(res, 'fs.upload', requestPath, 'failure', { reason: errorMessage(error) });
        throw error;
      }
    })
  );

  app.put(
    withOptionalPath('/api/rename'),
    wrapAsync(async (req: Request, res: Response) => {
      const requestPath = readWildcardPath(req);
      try {
        const result = await fileOps.rename(requestPath, readBodyField(req.body, 'newName'));
        auditFsEvent(res, 'fs.rename', result.from, 'success', { to: result.to });
        res.json({ message: 'File renamed successfully', from: result.from, to: result.to });
      } catch (error) {
        auditFsEvent(res, 'fs.rename', requestPath, 'failure', { reason: errorMessage(error) });
        throw error;
      }
    })
  );

  app.delete(
    withOptionalPath('/api/delete'),
    wrapAsync(async (req: Request, res: Response) => {
      const requestPath = readWildcardPath(req);
      try {
        const removed = await fileOps.remove(requestPath);
        auditFsEvent(res, 'fs.delete', removed, 'success');
        res.json({ message: 'File deleted successfully', path: removed });
      } catch (error) {
        auditFsEvent(res, 'fs.delete', requestPath, 'failure', { reason: errorMessage(error) });
        throw error;
      }
    })
  );

  app.post(
    withOptionalPath('/api/mkdir'),
    wrapAsync(async (req: Request, res: Response) => {
      const requestPath = readWildcardPath(req);
      try {
        const created = await fileOps.mkdir(requestPath, readBodyField(req.body, 'name'));
        auditFsEvent(res, 'fs.mkdir', created, 'success');
        res.json({ message: 'Directory created successfully', path: created });
      } catch (error) {
        auditFsEvent(res, 'fs.mkdir', requestPath, 'failure', { reason: errorMessage(error) });
        throw error;
      }
    })
  );

  app.get('/api/metrics', adminOnly, (_req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metrics.renderPrometheus());
  });
}
