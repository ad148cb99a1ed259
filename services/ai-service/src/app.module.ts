import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AIModule } from './ai/ai.module';

/**
 * AppModule
 *
 * Root module for the AI service. ConfigModule is global so the provider
 * registry factory can read backend credentials.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    AIModule,
  ],
})
export class AppModule {}
