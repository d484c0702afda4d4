import {
  WebSocketGateway,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { JwtPayload } from '../auth/types';

export const CHAT_TURN_EVENT = 'chat.turn';
export const CHAT_CLEARED_EVENT = 'chat.cleared';

/** The parts of a socket.io socket the gateway touches. */
export interface GatewayClient {
  id: string;
  handshake: {
    auth: Record<string, unknown>;
    headers: { authorization?: string };
  };
  data: { userKey?: string };
  emit(event: string, ...args: unknown[]): boolean;
  disconnect(close?: boolean): unknown;
}

// CORS for the socket server is set by ConfiguredIoAdapter from CORS_ORIGIN.
@WebSocketGateway()
@Injectable()
export class SocketGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(SocketGateway.name);
  // one user may have several tabs open
  private readonly connectedUsers: Map<string, Set<GatewayClient>> = new Map();

  constructor(private readonly jwtService: JwtService) {}

  handleConnection(client: GatewayClient) {
    const userKey = this.authenticate(client);
    if (!userKey) {
      this.logger.warn(`socket ${client.id} rejected: missing or invalid token`);
      client.emit('connection:error', { message: 'Unauthorized' });
      client.disconnect(true);
      return;
    }
    client.data.userKey = userKey;

    const sockets = this.connectedUsers.get(userKey) ?? new Set<GatewayClient>();
    sockets.add(client);
    this.connectedUsers.set(userKey, sockets);

    this.logger.debug(`socket ${client.id} connected as ${userKey}`);
    client.emit('connection:ack', { socketId: client.id, userKey });
  }

  handleDisconnect(client: GatewayClient) {
    const userKey = client.data.userKey;
    if (!userKey) return;

    const sockets = this.connectedUsers.get(userKey);
    sockets?.delete(client);
    if (sockets && sockets.size === 0) {
      this.connectedUsers.delete(userKey);
    }
  }

  emitToUser(userId: string, event: string, data: unknown): boolean {
    const sockets = this.connectedUsers.get(userId);
    if (!sockets || sockets.size === 0) {
      return false;
    }
    for (const socket of sockets) {
      socket.emit(event, data);
    }
    return true;
  }

  /** The user key is the token subject; ids named by the client are ignored. */
  private authenticate(client: GatewayClient): string | undefined {
    const token = this.readToken(client);
    if (!token) return undefined;
    try {
      const payload = this.jwtService.verify<JwtPayload>(token);
      return typeof payload.sub === 'string' && payload.sub.length > 0 ? payload.sub : undefined;
    } catch (error) {
      this.logger.debug(`socket ${client.id} token rejected: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }

  private readToken(client: GatewayClient): string | undefined {
    const fromAuth = client.handshake.auth.token;
    if (typeof fromAuth === 'string' && fromAuth.trim().length > 0) {
      return fromAuth.trim().replace(/^Bearer\s+/i, '');
    }
    const header = client.handshake.headers.authorization;
    if (header && /^Bearer\s+\S/i.test(header)) {
      return header.replace(/^Bearer\s+/i, '').trim();
    }
    return undefined;
  }
}
