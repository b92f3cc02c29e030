import { Controller, Get, Logger, Param, ParseUUIDPipe } from '@nestjs/common';
import { SessionStore } from './session-store';

@Controller()
export class SessionsController {
  private readonly logger = new Logger(SessionsController.name);

  constructor(private readonly sessions: SessionStore) {}

  @Get('new-session')
  newSession() {
    const session = this.sessions.createSession();
    this.logger.log(`Created session ${session.id}`);
    return { sessionId: session.id, createdAt: session.createdAt };
  }

  @Get('sessions/:id/history')
  history(@Param('id', ParseUUIDPipe) id: string) {
    return { sessionId: id, records: this.sessions.history(id) };
  }
}
