import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './config/env.validation';
import { AnalysisModule } from './analysis/analysis.module';
import { ResumeModule } from './resume/resume.module';

@Module({
  imports: [
    // Global configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),

    // Analysis pipeline (global)
    AnalysisModule,

    // Feature modules
    ResumeModule,
  ],
})
export class AppModule {}
