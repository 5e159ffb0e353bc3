import {
  Controller,
  Get,
  Post,
  Body,
  Query,
  UseInterceptors,
  UploadedFile,
  HttpCode,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiTags, ApiOperation, ApiResponse, ApiConsumes, ApiBody } from '@nestjs/swagger';
import { ResumeService } from './resume.service';
import { AnalyzeOptionsDto, AnalyzeTextDto } from '../common/dto';

@ApiTags('Resume')
@Controller('resume')
export class ResumeController {
  constructor(private readonly resumeService: ResumeService) {}

  /**
   * POST /api/resume/analyze
   * Upload a resume PDF and get its profile, score and role fit
   */
  @Post('analyze')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file'))
  @ApiOperation({ summary: 'Analyze resume PDF', description: 'Upload a resume PDF and get its profile, score and role fit' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        file: {
          type: 'string',
          format: 'binary',
          description: 'PDF file of the resume',
        },
      },
    },
  })
  @ApiResponse({ status: 200, description: 'Resume analyzed (or reported as too sparse)' })
  @ApiResponse({ status: 400, description: 'No file, non-PDF file or unknown target role' })
  @ApiResponse({ status: 413, description: 'File exceeds the upload limit' })
  @ApiResponse({ status: 422, description: 'PDF could not be parsed' })
  async analyze(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query() options: AnalyzeOptionsDto,
  ) {
    if (!file) {
      throw new HttpException('No file uploaded', HttpStatus.BAD_REQUEST);
    }

    if (!file.originalname.toLowerCase().endsWith('.pdf')) {
      throw new HttpException('Only PDF files are supported', HttpStatus.BAD_REQUEST);
    }

    const response = await this.resumeService.analyzeUpload(file.buffer, file.originalname, options);
    return {
      success: true,
      ...response,
    };
  }

  /**
   * POST /api/resume/analyze-text
   * Analyze resume text that was extracted elsewhere
   */
  @Post('analyze-text')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Analyze resume text', description: 'Analyze resume text that was extracted elsewhere' })
  @ApiResponse({ status: 200, description: 'Resume analyzed (or reported as too sparse)' })
  @ApiResponse({ status: 400, description: 'Invalid body or unknown target role' })
  async analyzeText(@Body() dto: AnalyzeTextDto) {
    const response = await this.resumeService.analyzeText(dto);
    return {
      success: true,
      ...response,
    };
  }

  /**
   * GET /api/resume/roles
   * List the configured role profiles
   */
  @Get('roles')
  @ApiOperation({ summary: 'List role profiles', description: 'List the configured role profiles and their weighted skills' })
  @ApiResponse({ status: 200, description: 'Configured role profiles' })
  listRoles() {
    return {
      success: true,
      roles: this.resumeService.listRoles(),
    };
  }
}
