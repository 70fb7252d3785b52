import { Module } from '@nestjs/common'
import { ConfigModule } from './config/config.module'
import { GenerationModule } from './generation/generation.module'

@Module({
  imports: [ConfigModule, GenerationModule],
})
export class AppModule {}
