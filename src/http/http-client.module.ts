import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { CredentialsModule } from '../credentials/credentials.module';
import { HTTP_CLIENT } from './request.types';
import { RequestPipelineService } from './request-pipeline.service';
import { TokenRefreshService } from './token-refresh.service';

@Module({
  imports: [CredentialsModule],
  providers: [
    {
      provide: HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        axios.create({
          baseURL: config.get<string>('API_BASE_URL', 'http://localhost:8080/api/v1'),
          timeout: Number(config.get<number>('HTTP_TIMEOUT_MS', 30_000)),
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
        }),
    },
    TokenRefreshService,
    RequestPipelineService,
  ],
  exports: [RequestPipelineService, TokenRefreshService],
})
export class HttpClientModule {}
