/**
 * JSON HTTP API in front of the matchmaker:
 *
 * - GET  /health, /api/health
 * - POST /api/chat/start?username=
 * - GET  /api/chat/queue-status?username=
 * - GET  /api/chat/rooms/waiting
 * - GET  /api/chat/rooms/:code
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { AuthHook } from "./auth/index.js";
import type { Logger } from "./logger.js";
import { isMatchmakingError, type ChatMatchmaker } from "./matchmaking/index.js";
import type {
  ApiErrorResponse,
  HealthResponse,
  QueueStatusResponse,
  RoomView,
  StartChatResponse,
} from "./protocol.js";

const ALLOWED_METHODS = "GET, POST, OPTIONS";
const ALLOWED_HEADERS = "Content-Type, Authorization";
const MAX_USERNAME_LENGTH = 64;

export interface HttpHandlerOptions {
  matchmaker: ChatMatchmaker;
  logger: Logger;
  /** Resolves the caller's identity; a username it returns overrides the query. */
  onAuth?: AuthHook;
  /** Reject /api/chat requests without a valid token (default: true when onAuth is set). */
  authRequired?: boolean;
  /** Allowed CORS origins; "*" allows any (default: ["*"]). */
  corsAllowedOrigins?: string[];
  /** Live WebSocket count reported by the health check. */
  activeConnections?: () => number;
  now?: () => number;
}

export type HttpHandler = (req: IncomingMessage, res: ServerResponse) => void;

/** Ends request handling with a JSON error response. */
export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
  }
}

interface RequestContext {
  req: IncomingMessage;
  url: URL;
  match: RegExpExecArray;
}

interface Route {
  pattern: RegExp;
  method: "GET" | "POST";
  handle: (ctx: RequestContext) => Promise<unknown>;
}

function writeJson(
  res: ServerResponse,
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): void {
  res.writeHead(status, {
    ...headers,
    "Content-Type": "application/json",
    "X-Content-Type-Options": "nosniff",
  });
  res.end(JSON.stringify(body));
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(400, "INVALID_PATH", "Malformed path segment");
  }
}

function statusForMatchmakingCode(code: string): number {
  switch (code) {
    case "ROOM_NOT_FOUND":
      return 404;
    case "ROOM_FULL":
      return 403;
    default:
      return 500;
  }
}

export function createHttpHandler(options: HttpHandlerOptions): HttpHandler {
  const { matchmaker } = options;
  const logger = options.logger.child({ component: "http" });
  const now = options.now ?? Date.now;
  const origins = options.corsAllowedOrigins ?? ["*"];
  const allowAnyOrigin = origins.includes("*");
  const authRequired = options.authRequired ?? options.onAuth !== undefined;

  function corsHeaders(origin: string | undefined): Record<string, string> {
    const headers: Record<string, string> = {
      "Access-Control-Allow-Methods": ALLOWED_METHODS,
      "Access-Control-Allow-Headers": ALLOWED_HEADERS,
    };
    if (allowAnyOrigin) {
      headers["Access-Control-Allow-Origin"] = "*";
    } else if (origin) {
      headers["Access-Control-Allow-Origin"] = origin;
      headers["Vary"] = "Origin";
    }
    return headers;
  }

  function errorBody(code: string, message: string): ApiErrorResponse {
    return { error: message, code, timestamp: now() };
  }

  /** Username carried by the token, if any. Throws 401 when a token is required. */
  async function authenticate(req: IncomingMessage): Promise<string | undefined> {
    if (!options.onAuth) return undefined;
    const user = await options.onAuth(req);
    if (!user) {
      if (authRequired) throw new HttpError(401, "UNAUTHORIZED", "Missing or invalid token");
      return undefined;
    }
    return user.username;
  }

  async function resolveUsername(ctx: RequestContext): Promise<string> {
    const fromToken = await authenticate(ctx.req);
    const username = (fromToken ?? ctx.url.searchParams.get("username") ?? "").trim();
    if (!username) {
      throw new HttpError(400, "MISSING_USERNAME", "username is required");
    }
    if (username.length > MAX_USERNAME_LENGTH) {
      throw new HttpError(
        400,
        "INVALID_USERNAME",
        `username must be at most ${MAX_USERNAME_LENGTH} characters`
      );
    }
    return username;
  }

  async function health(): Promise<HealthResponse> {
    return {
      status: "healthy",
      timestamp: now(),
      activeConnections: options.activeConnections?.() ?? 0,
      queueSize: await matchmaker.getQueueSize(),
    };
  }

  const routes: Route[] = [
    { pattern: /^\/health$/, method: "GET", handle: health },
    { pattern: /^\/api\/health$/, method: "GET", handle: health },
    {
      pattern: /^\/api\/chat\/start$/,
      method: "POST",
      handle: async (ctx): Promise<StartChatResponse> => {
        const username = await resolveUsername(ctx);
        const result = await matchmaker.startChat(username);
        logger.info({ username, status: result.status }, "start chat");
        return result;
      },
    },
    {
      pattern: /^\/api\/chat\/queue-status$/,
      method: "GET",
      handle: async (ctx): Promise<QueueStatusResponse> => {
        const username = await resolveUsername(ctx);
        const [position, size] = await Promise.all([
          matchmaker.getQueuePosition(username),
          matchmaker.getQueueSize(),
        ]);
        return { in_queue: position > 0, position, queue_size: size };
      },
    },
    {
      pattern: /^\/api\/chat\/rooms\/waiting$/,
      method: "GET",
      handle: async (ctx): Promise<{ rooms: RoomView[] }> => {
        await authenticate(ctx.req);
        return { rooms: await matchmaker.getWaitingRooms() };
      },
    },
    {
      pattern: /^\/api\/chat\/rooms\/([^/]+)$/,
      method: "GET",
      handle: async (ctx): Promise<{ room: RoomView }> => {
        await authenticate(ctx.req);
        const code = decodePathSegment(ctx.match[1]);
        const room = await matchmaker.getRoom(code);
        if (!room) throw new HttpError(404, "ROOM_NOT_FOUND", `Room ${code} not found`);
        return { room };
      },
    },
  ];

  async function dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const origin = req.headers.origin;
    const cors = corsHeaders(origin);

    if (origin && !allowAnyOrigin && !origins.includes(origin)) {
      writeJson(res, 403, errorBody("ORIGIN_NOT_ALLOWED", "Origin not allowed"));
      return;
    }
    if (req.method === "OPTIONS") {
      res.writeHead(204, cors);
      res.end();
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    const matching = routes
      .map((route) => ({ route, match: route.pattern.exec(url.pathname) }))
      .filter((m): m is { route: Route; match: RegExpExecArray } => m.match !== null);
    if (matching.length === 0) {
      writeJson(res, 404, errorBody("NOT_FOUND", "Not found"), cors);
      return;
    }
    const hit = matching.find((m) => m.route.method === req.method);
    if (!hit) {
      const allow = [...new Set(matching.map((m) => m.route.method)), "OPTIONS"].join(", ");
      writeJson(res, 405, errorBody("METHOD_NOT_ALLOWED", "Method not allowed"), {
        ...cors,
        Allow: allow,
      });
      return;
    }

    try {
      const body = await hit.route.handle({ req, url, match: hit.match });
      writeJson(res, 200, body, cors);
    } catch (err) {
      if (err instanceof HttpError) {
        writeJson(res, err.status, errorBody(err.code, err.message), cors);
        return;
      }
      if (isMatchmakingError(err)) {
        const status = statusForMatchmakingCode(err.code);
        if (status === 500) logger.error({ err }, "matchmaking failure");
        writeJson(res, status, errorBody(err.code, err.message), cors);
        return;
      }
      throw err;
    }
  }

  return (req, res) => {
    const started = now();
    res.on("finish", () => {
      logger.info(
        {
          method: req.method,
          path: (req.url ?? "/").split("?")[0],
          status: res.statusCode,
          durationMs: now() - started,
        },
        "http request"
      );
    });
    dispatch(req, res).catch((err: unknown) => {
      logger.error({ err }, "unhandled request error");
      if (!res.headersSent) {
        writeJson(res, 500, errorBody("INTERNAL_ERROR", "Internal server error"));
      } else {
        res.end();
      }
    });
  };
}
