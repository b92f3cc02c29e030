import { Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { SessionStore } from './session-store';
import { SessionsController } from './sessions.controller';

@Module({
  controllers: [SessionsController],
  providers: [
    {
      provide: SessionStore,
      useFactory: (config: AppConfig) =>
        new SessionStore({ ttlMs: config.sessionTtlMs, maxSessions: config.maxSessions }),
      inject: [APP_CONFIG],
    },
  ],
  exports: [SessionStore],
})
export class SessionsModule {}
