/**
 * Voice API Routes
 *
 * The inbound side of the assistant. Transcription happens in the client;
 * these endpoints take the transcript of one voice turn:
 * - POST /voice/command - one turn, returns what would be spoken
 * - WebSocket /voice/stream - real-time session, spoken text pushed back
 */

import { IncomingMessage, Server } from 'http';
import { Duplex } from 'stream';
import { Router, Response } from 'express';
import { WebSocket, WebSocketServer, RawData } from 'ws';
import { requireAuth, AuthenticatedRequest, verifyToken, bearerToken, AuthError } from '../middleware/auth';
import { CommandInterpreter, Speaker } from '../core/commandInterpreter';
import { CollectingSpeaker, VoiceSession } from '../core/voiceSession';
import { VoiceClientMessage, VoiceCommandRequest, VoiceServerMessage } from '../core/schemas';
import { logger, describeError } from '../services/logger';

export const VOICE_STREAM_PATH = '/api/v1/voice/stream';

// =============================================================================
// HTTP
// =============================================================================

export interface VoiceRouterDeps {
  interpreter: CommandInterpreter;
  jwtSecret: string;
}

export function createVoiceRouter({ interpreter, jwtSecret }: VoiceRouterDeps): Router {
  const router = Router();
  router.use(requireAuth(jwtSecret));

  // HTTP turns share one queue, so they run one at a time like a voice session
  const session = new VoiceSession(interpreter, 'http');

  /**
   * POST /voice/command
   * Handle one utterance and return the spoken lines
   */
  router.post('/command', async (req: AuthenticatedRequest, res: Response) => {
    const parsed = VoiceCommandRequest.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', details: parsed.error.issues });
      return;
    }

    try {
      const speaker = new CollectingSpeaker();
      const report = await session.submit(parsed.data.text, speaker);

      res.json({
        turnId: report.turnId,
        rule: report.rule,
        status: report.status,
        spoken: speaker.lines,
        result: report.result ? { success: report.result.success, message: report.result.message } : null,
      });
    } catch (error) {
      logger.error('Voice command failed', { userId: req.user?.userId, error: describeError(error) });
      res.status(500).json({ error: 'Voice command failed' });
    }
  });

  return router;
}

// =============================================================================
// WEBSOCKET STREAMING
// =============================================================================

interface SocketLike {
  readonly readyState: number;
  send(data: string): void;
}

function send(ws: SocketLike, message: VoiceServerMessage): void {
  if (ws.readyState !== WebSocket.OPEN) {
    throw new Error('Voice socket is not open');
  }
  ws.send(JSON.stringify(message));
}

export class SocketSpeaker implements Speaker {
  constructor(private ws: SocketLike) {}

  async speak(text: string): Promise<void> {
    send(this.ws, { type: 'speak', text });
  }
}

/**
 * Handle one inbound frame from a voice client
 */
export async function handleClientFrame(data: string, ws: SocketLike, session: VoiceSession): Promise<void> {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    send(ws, { type: 'error', error: 'Messages must be JSON' });
    return;
  }

  const message = VoiceClientMessage.safeParse(raw);
  if (!message.success) {
    send(ws, { type: 'error', error: 'Unknown message' });
    return;
  }

  switch (message.data.type) {
    case 'ping':
      send(ws, { type: 'pong' });
      return;
    case 'utterance': {
      const report = await session.submit(message.data.text);
      if (ws.readyState === WebSocket.OPEN) {
        send(ws, { type: 'turn_complete', turnId: report.turnId });
      }
      return;
    }
  }
}

/**
 * Tracks open voice sockets so server-side events (reminders) can be spoken
 */
export class VoiceConnectionHub {
  private sockets: Set<SocketLike> = new Set();

  add(ws: SocketLike): void {
    this.sockets.add(ws);
  }

  remove(ws: SocketLike): void {
    this.sockets.delete(ws);
  }

  get size(): number {
    return this.sockets.size;
  }

  /**
   * Speak to every connected client; returns how many received it
   */
  broadcast(text: string): number {
    let delivered = 0;
    for (const ws of this.sockets) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      send(ws, { type: 'speak', text });
      delivered += 1;
    }
    return delivered;
  }
}

export interface VoiceStreamDeps {
  interpreter: CommandInterpreter;
  jwtSecret: string;
  hub: VoiceConnectionHub;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

function tokenFromRequest(req: IncomingMessage): string | null {
  const url = new URL(req.url ?? '/', 'http://localhost');
  return url.searchParams.get('token') ?? bearerToken(req.headers.authorization);
}

/**
 * Attach the voice stream to an HTTP server. Clients authenticate during
 * the upgrade with ?token= or an Authorization header.
 */
export function attachVoiceStream(server: Server, { interpreter, jwtSecret, hub }: VoiceStreamDeps): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  const onConnection = (ws: WebSocket, userId: string) => {
    const session = new VoiceSession(interpreter, 'voice', new SocketSpeaker(ws));
    hub.add(ws);
    logger.info('Voice WebSocket connected', { sessionId: session.id, userId });

    ws.on('message', (data: RawData) => {
      handleClientFrame(rawDataToString(data), ws, session).catch((error: unknown) => {
        logger.error('WebSocket message error', { sessionId: session.id, error: describeError(error) });
        if (ws.readyState === WebSocket.OPEN) {
          send(ws, { type: 'error', error: 'Processing failed' });
        }
      });
    });

    ws.on('close', () => {
      hub.remove(ws);
      session.close().catch((error: unknown) => {
        logger.error('Voice session close failed', { sessionId: session.id, error: describeError(error) });
      });
      logger.info('Voice WebSocket disconnected', { sessionId: session.id });
    });

    ws.on('error', (error) => {
      logger.error('Voice WebSocket error', { sessionId: session.id, error: error.message });
    });

    send(ws, { type: 'connected', sessionId: session.id });
  };

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (pathname !== VOICE_STREAM_PATH) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }

    const token = tokenFromRequest(req);
    if (!token) {
      rejectUpgrade(socket, 401, 'Unauthorized');
      return;
    }

    let userId: string;
    try {
      userId = verifyToken(token, jwtSecret).userId;
    } catch (error) {
      if (!(error instanceof AuthError)) {
        logger.error('Voice stream upgrade failed', { error: describeError(error) });
      }
      rejectUpgrade(socket, 401, 'Unauthorized');
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => onConnection(ws, userId));
  });

  return wss;
}
