import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CREDENTIAL_STORE } from './credential-store.types';
import { InMemoryCredentialStore } from './in-memory-credential.store';

@Module({
  providers: [
    {
      provide: CREDENTIAL_STORE,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const store = new InMemoryCredentialStore();
        store.seed(
          config.get<string>('ACCESS_TOKEN', ''),
          config.get<string>('REFRESH_TOKEN', ''),
        );
        return store;
      },
    },
  ],
  exports: [CREDENTIAL_STORE],
})
export class CredentialsModule {}
