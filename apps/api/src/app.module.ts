import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { QueryModule } from './query/query.module';
import { SessionsModule } from './sessions/sessions.module';

@Module({
  imports: [ConfigModule, SessionsModule, QueryModule],
})
export class AppModule {}
