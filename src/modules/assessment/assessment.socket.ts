/**
 * Assessment Socket Handlers
 * Real-time WebSocket event handlers for assessments
 */

import { Socket } from 'socket.io';
import { errorMessage } from '../../lib/errors';
import { assessmentRoom, assessmentService, AssessmentService, toAssessmentView } from './assessment.service';
import type { IAssessmentJob, IAssessmentSocketResponse } from './assessment.types';

/**
 * The part of a Socket.IO socket the handlers talk to
 */
export interface AssessmentSocketClient {
  id: string;
  join(room: string): unknown;
  leave(room: string): unknown;
  emit(event: string, response: IAssessmentSocketResponse): unknown;
}

export interface AssessmentSocketHandlers {
  join(assessmentId: string): void;
  leave(assessmentId: string): void;
  status(assessmentId: string): Promise<void>;
  cancel(assessmentId: string): Promise<void>;
}

async function respond(
  client: AssessmentSocketClient,
  event: string,
  load: () => Promise<IAssessmentJob>
): Promise<void> {
  try {
    const job = await load();
    client.emit(event, { success: true, assessment: toAssessmentView(job) });
  } catch (error) {
    client.emit(event, { success: false, error: errorMessage(error) });
  }
}

export const createAssessmentSocketHandlers = (
  client: AssessmentSocketClient,
  service: AssessmentService = assessmentService
): AssessmentSocketHandlers => ({
  join: (assessmentId) => {
    void client.join(assessmentRoom(assessmentId));
    console.log(`Socket ${client.id} joined assessment room: ${assessmentId}`);
  },

  leave: (assessmentId) => {
    void client.leave(assessmentRoom(assessmentId));
    console.log(`Socket ${client.id} left assessment room: ${assessmentId}`);
  },

  status: (assessmentId) => respond(client, 'assessment:status:response', () => service.getJob(assessmentId)),

  cancel: (assessmentId) => respond(client, 'assessment:cancel:response', () => service.cancelJob(assessmentId)),
});

/**
 * Register assessment socket event handlers
 */
export const registerAssessmentSocketHandlers = (
  socket: Socket,
  service: AssessmentService = assessmentService
): void => {
  const handlers = createAssessmentSocketHandlers(socket, service);

  /**
   * Join an assessment room for progress updates
   */
  socket.on('assessment:join', handlers.join);
  socket.on('assessment:leave', handlers.leave);

  /**
   * Request current assessment status
   */
  socket.on('assessment:status', handlers.status);
  socket.on('assessment:cancel', handlers.cancel);
};
