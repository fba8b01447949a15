/**
 * Server Entry Point
 * Initializes Express server and Socket.IO
 */

import { createServer } from 'http';
import { createApp } from './app';
import { initializeSocket } from './lib/socket';
import { registerAssessmentSocketHandlers } from './modules/assessment/assessment.socket';
import { env } from './config/env';

const startServer = (): void => {
  try {
    const app = createApp();
    const httpServer = createServer(app);
    const io = initializeSocket(httpServer);

    io.on('connection', (socket) => {
      console.log(`✅ Socket connected: ${socket.id}`);

      registerAssessmentSocketHandlers(socket);

      socket.on('disconnect', () => {
        console.log(`❌ Socket disconnected: ${socket.id}`);
      });
    });

    httpServer.listen(env.PORT, () => {
      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('🚀 Openness Crawler is running');
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 LLM: ${env.LLM_ENABLED && env.OPENAI_API_KEY ? env.OPENAI_MODEL : 'disabled (pattern matching only)'}`);
      console.log(`🚀 API: http://localhost:${env.PORT}/health`);
      console.log(`🚀 Socket.IO: ws://localhost:${env.PORT}`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    const shutdown = (signal: string) => {
      console.log(`${signal} signal received: closing HTTP server`);
      io.close();
      httpServer.close(() => {
        console.log('HTTP server closed');
        process.exit(0);
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

startServer();
