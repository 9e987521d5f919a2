import { Module } from '@nestjs/common';
import { CredentialsModule } from '../credentials/credentials.module';
import { RealtimeChannelService } from './realtime-channel.service';
import { SOCKET_FACTORY, wsSocketFactory } from './realtime.types';

@Module({
  imports: [CredentialsModule],
  providers: [
    { provide: SOCKET_FACTORY, useValue: wsSocketFactory },
    RealtimeChannelService,
  ],
  exports: [RealtimeChannelService],
})
export class RealtimeModule {}
