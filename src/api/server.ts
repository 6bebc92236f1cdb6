import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { readFileSync, statSync } from 'fs';
import { extname, resolve, sep } from 'path';
import type { EnrollmentEngine } from '../activities/enrollment.js';
import type { ActivitySnapshot, EnrollmentResult } from '../activities/types.js';

export interface ActivitiesServerOptions {
  engine: EnrollmentEngine;
  staticDir: string;
}

interface ActivityWire {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
};

const ENROLLMENT_ROUTE = /^\/activities\/([^/]+)\/(signup|unregister)$/;

// --- HTTP helpers ---

function json(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' });
  res.end(JSON.stringify(data));
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // left raw: it will not match any activity name
    return segment;
  }
}

export function toWire(activities: ReadonlyMap<string, ActivitySnapshot>): Record<string, ActivityWire> {
  const out: Record<string, ActivityWire> = {};
  for (const [name, a] of activities) {
    out[name] = {
      description: a.description,
      schedule: a.schedule,
      max_participants: a.maxParticipants,
      participants: a.participants,
    };
  }
  return out;
}

export function statusFor(result: EnrollmentResult): number {
  if (result.ok) return 200;
  return result.kind === 'not_found' ? 404 : 400;
}

// --- Handlers ---

function handleEnrollment(
  engine: EnrollmentEngine,
  action: 'signup' | 'unregister',
  activityName: string,
  query: URLSearchParams,
  res: ServerResponse,
): void {
  const email = query.get('email');
  if (!email) {
    json(res, 422, { detail: 'missing "email" query parameter' });
    return;
  }

  const result = action === 'signup'
    ? engine.signup(activityName, email)
    : engine.unregister(activityName, email);

  if (result.ok) {
    json(res, 200, { message: result.message });
  } else {
    json(res, statusFor(result), { detail: result.message });
  }
}

function serveStatic(staticDir: string, relPath: string, res: ServerResponse): void {
  const root = resolve(staticDir);
  const filePath = resolve(root, '.' + sep + decodeSegment(relPath));
  if (!filePath.startsWith(root + sep)) {
    json(res, 404, { detail: 'Not Found' });
    return;
  }

  try {
    if (!statSync(filePath).isFile()) {
      json(res, 404, { detail: 'Not Found' });
      return;
    }
    const body = readFileSync(filePath);
    const type = CONTENT_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
    res.writeHead(200, { 'Content-Type': type, 'Cache-Control': 'no-cache' });
    res.end(body);
  } catch {
    json(res, 404, { detail: 'Not Found' });
  }
}

// --- Server ---

export function createActivitiesServer({ engine, staticDir }: ActivitiesServerOptions): Server {
  const startedAt = Date.now();

  const route = (req: IncomingMessage, res: ServerResponse): void => {
    // "//x" stays a path, never a host
    const url = new URL(`http://localhost${req.url || '/'}`);
    const path = url.pathname;

    if (path === '/' && req.method === 'GET') {
      res.writeHead(307, { Location: '/static/index.html' });
      res.end();
      return;
    }
    if (path.startsWith('/static/') && req.method === 'GET') {
      serveStatic(staticDir, path.slice('/static/'.length), res);
      return;
    }
    if (path === '/activities' && req.method === 'GET') {
      json(res, 200, toWire(engine.listActivities()));
      return;
    }
    if (path === '/api/health' && req.method === 'GET') {
      json(res, 200, {
        status: 'ok',
        activities: engine.listActivities().size,
        uptimeMs: Date.now() - startedAt,
      });
      return;
    }

    const match = ENROLLMENT_ROUTE.exec(path);
    if (match && req.method === 'POST') {
      const action = match[2] === 'signup' ? 'signup' : 'unregister';
      handleEnrollment(engine, action, decodeSegment(match[1]), url.searchParams, res);
      return;
    }

    json(res, 404, { detail: 'Not Found' });
  };

  return createServer((req, res) => {
    if (req.method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type',
      });
      res.end();
      return;
    }

    try {
      route(req, res);
    } catch (err) {
      console.error('[Server] Request error:', err);
      if (!res.headersSent) {
        json(res, 500, { detail: 'Internal Server Error' });
      } else {
        res.end();
      }
    }
  });
}
