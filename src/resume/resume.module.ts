import { Module } from '@nestjs/common';
import { MulterModule, MulterModuleOptions } from '@nestjs/platform-express';
import { UploadConfig } from '../analysis/services/pdf-parser.service';
import { ResumeController } from './resume.controller';
import { ResumeService } from './resume.service';

// Multer stops reading at the ceiling and answers 413 itself
export const uploadLimits = (upload: UploadConfig): MulterModuleOptions => ({
  limits: { fileSize: upload.maxUploadBytes },
});

@Module({
  imports: [
    MulterModule.registerAsync({
      inject: ['UPLOAD_CONFIG'],
      useFactory: uploadLimits,
    }),
  ],
  controllers: [ResumeController],
  providers: [ResumeService],
  exports: [ResumeService],
})
export class ResumeModule {}
