import { Module } from '@nestjs/common';
import { RealtimeModule } from '../realtime/realtime.module';
import { TopicRouterService } from './topic-router.service';

@Module({
  imports: [RealtimeModule],
  providers: [TopicRouterService],
  exports: [TopicRouterService],
})
export class TopicsModule {}
