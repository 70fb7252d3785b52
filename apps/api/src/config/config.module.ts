import { Global, Module } from '@nestjs/common'
import { CONFIG_SOURCE, ConfigStore, DEFAULT_CONFIG_PATH } from './config-store.service'

@Global()
@Module({
  providers: [
    {
      provide: CONFIG_SOURCE,
      useFactory: () => ({ path: process.env.GENERATION_CONFIG_PATH || DEFAULT_CONFIG_PATH, env: process.env }),
    },
    ConfigStore,
  ],
  exports: [ConfigStore],
})
export class ConfigModule {}
