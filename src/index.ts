import 'reflect-metadata';
export { AppModule } from './app.module';
export { CREDENTIAL_STORE } from './credentials/credential-store.types';
export type { CredentialStore } from './credentials/credential-store.types';
export { CredentialsModule } from './credentials/credentials.module';
export { InMemoryCredentialStore } from './credentials/in-memory-credential.store';
export { ApiError, ApiErrorType, SessionInvalidError } from './http/api-error';
export { HttpClientModule } from './http/http-client.module';
export { RequestPipelineService } from './http/request-pipeline.service';
export { TokenRefreshService } from './http/token-refresh.service';
export { HTTP_CLIENT } from './http/request.types';
export type { ApiRequest, HttpMethod, RequestOptions } from './http/request.types';
export { MissingAccessTokenError, RealtimeChannelService } from './realtime/realtime-channel.service';
export { RealtimeModule } from './realtime/realtime.module';
export { ConnectionState, REALTIME_EVENTS, SOCKET_FACTORY } from './realtime/realtime.types';
export type {
  ConnectionStatusEvent,
  OutboundMessage,
  RealtimeSocket,
  ServerMessage,
  SocketFactory,
} from './realtime/realtime.types';
export { TopicRouterService } from './topics/topic-router.service';
export { TopicsModule } from './topics/topics.module';
export type { Subscription, Topic } from './topics/topics.types';
