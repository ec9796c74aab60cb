import express, { type Request, type Response } from 'express';
import http from 'http';
import type { AddressInfo } from 'net';
import cors from 'cors';
import { Server } from 'socket.io';
import { rngFor, type ServerConfig } from '../config';
import type { GameInstance } from '../game/gameInstance';
import { WaitingRoom } from '../game/matchmakingManager';
import { PlayerIdAllocator } from '../game/player';
import { buildCards } from '../game/settings';
import { logger as rootLogger, type Logger } from '../logger';
import type { ClientBoundEvents, ServerBoundEvents } from '../protocol/messages';
import { AsyncChannel } from './channel';
import { ConnectionLimiter } from './connectionLimiter';
import { PlayerConnection } from './connection';
import type { ServerInternalEvent } from './internalEvents';

export type GameServerStatus = {
  waitingPlayers: number;
  runningMatches: number;
  finishedMatches: number;
  connections: number;
  capacity: number;
};

/**
 * HTTP + socket.io front of the game. Runs waiting rooms one after another;
 * every filled room becomes a match that runs on its own.
 */
export class GameServer {
  readonly app = express();
  readonly httpServer: http.Server;
  readonly io: Server<ServerBoundEvents, ClientBoundEvents>;
  private readonly limiter: ConnectionLimiter;
  private readonly ids = new PlayerIdAllocator();
  private readonly connections = new Map<string, PlayerConnection>();
  private readonly matches = new Set<GameInstance>();
  private readonly matchRuns = new Set<Promise<void>>();
  private lobbyChannel = new AsyncChannel<ServerInternalEvent>();
  private waitingRoom: WaitingRoom | null = null;
  private roomsLoop: Promise<void> | null = null;
  private finishedMatches = 0;
  private stopping = false;
  private readonly log: Logger;

  constructor(private readonly config: ServerConfig, log: Logger = rootLogger) {
    this.log = log.child({ module: 'server' });
    // fail on unplayable rules before accepting anybody
    buildCards(config.game);
    this.limiter = new ConnectionLimiter(config.maxConnections);

    this.app.use(cors({ origin: config.corsOrigin }));
    this.app.use(express.json());
    this.app.get('/health', (_req: Request, res: Response) => res.status(200).json({ ok: true }));
    this.app.get('/api/status', (_req: Request, res: Response) => res.json(this.status()));

    this.httpServer = http.createServer(this.app);
    this.io = new Server<ServerBoundEvents, ClientBoundEvents>(this.httpServer, {
      cors: { origin: config.corsOrigin },
    });

    this.io.use((socket, next) => {
      const release = this.limiter.tryAcquire();
      if (!release) {
        this.log.warn({ clientId: socket.id }, 'connection refused, server is full');
        next(new Error('server is full'));
        return;
      }
      socket.once('disconnect', release);
      next();
    });

    this.io.on('connection', (socket) => {
      const connection = new PlayerConnection(
        {
          id: socket.id,
          send: (message) => {
            socket.emit('message', message);
          },
          close: () => {
            socket.disconnect(true);
          },
        },
        () => this.lobbyChannel,
        this.log,
      );
      this.connections.set(socket.id, connection);
      this.log.info({ clientId: socket.id }, 'client connected');

      socket.on('message', (raw) => connection.onMessage(raw));
      socket.on('disconnect', (reason) => {
        this.connections.delete(socket.id);
        connection.onDisconnect(reason);
      });
    });
  }

  async start(): Promise<AddressInfo> {
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(this.config.port, this.config.host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });
    const address = this.httpServer.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port');
    this.log.info({ host: address.address, port: address.port }, 'game server started');

    this.roomsLoop = this.runRooms().catch((err: unknown) => {
      this.log.error({ err }, 'rooms loop failed');
    });
    return address;
  }

  status(): GameServerStatus {
    return {
      waitingPlayers: this.waitingRoom?.seats.count ?? 0,
      runningMatches: this.matches.size,
      finishedMatches: this.finishedMatches,
      connections: this.connections.size,
      capacity: this.limiter.capacity,
    };
  }

  async stop() {
    if (this.stopping) return;
    this.stopping = true;
    this.log.info({ connections: this.connections.size }, 'game server stopping');

    for (const connection of this.connections.values()) connection.send({ type: 'server_shutdown' });
    this.lobbyChannel.close();
    for (const match of this.matches) match.stop();

    await this.roomsLoop;
    await Promise.all(this.matchRuns);
    await new Promise<void>((resolve) => {
      this.io.close(() => resolve());
    });
  }

  private async runRooms() {
    const rng = rngFor(this.config);
    while (!this.stopping) {
      const room = new WaitingRoom(this.lobbyChannel, { settings: this.config.game, rng, ids: this.ids, log: this.log });
      this.waitingRoom = room;
      const match = await room.run();
      this.waitingRoom = null;
      if (!match) break;

      this.lobbyChannel = new AsyncChannel<ServerInternalEvent>();
      this.track(match);
    }
  }

  private track(match: GameInstance) {
    this.matches.add(match);
    const run = match
      .run()
      .then(({ finished }) => {
        if (finished) this.finishedMatches += 1;
      })
      .catch((err: unknown) => {
        this.log.error({ err, players: match.players }, 'match crashed');
      })
      .finally(() => {
        this.matches.delete(match);
        this.matchRuns.delete(run);
      });
    this.matchRuns.add(run);
  }
}
