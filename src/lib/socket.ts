/**
 * Socket.IO initialization and room broadcasts
 * Connection handling is done in server.ts
 */

import { Server as HTTPServer } from 'http';
import { Server } from 'socket.io';
import { env } from '../config/env';

let io: Server | null = null;

export const initializeSocket = (httpServer: HTTPServer): Server => {
  io = new Server(httpServer, {
    cors: {
      origin: env.CLIENT_URL,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  });

  return io;
};

/**
 * Emit to one room. A no-op without a server, e.g. when running from the CLI.
 */
export const emitToRoom = (room: string, event: string, payload: unknown): boolean => {
  if (!io) {
    return false;
  }
  io.to(room).emit(event, payload);
  return true;
};
