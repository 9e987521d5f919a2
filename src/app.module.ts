import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import envConfig from './config/env.config';
import { CredentialsModule } from './credentials/credentials.module';
import { HttpClientModule } from './http/http-client.module';
import { RealtimeModule } from './realtime/realtime.module';
import { TopicsModule } from './topics/topics.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [envConfig] }),
    EventEmitterModule.forRoot(),
    CredentialsModule,
    HttpClientModule,
    RealtimeModule,
    TopicsModule,
  ],
  exports: [CredentialsModule, HttpClientModule, RealtimeModule, TopicsModule],
})
export class AppModule {}
