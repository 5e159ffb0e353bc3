import { HttpException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import { AnalysisOutcome, RoleProfile } from '../common/interfaces';
import { AnalyzeOptionsDto, AnalyzeTextDto } from '../common/dto';
import { ResumeAnalysisAgent, UnknownRoleError } from '../analysis/resume-analysis.agent';
import { RoleMatcherTool } from '../analysis/tools/role-matcher.tool';
import {
  DocumentParseError,
  DocumentTooLargeError,
  PdfParserService,
} from '../analysis/services/pdf-parser.service';

export interface DocumentSummary {
  fileName: string;
  numPages: number;
  byteSize: number;
  readable: boolean;
}

export interface ResumeAnalysisResponse {
  document: DocumentSummary | null;
  result: AnalysisOutcome;
}

@Injectable()
export class ResumeService {
  private readonly logger = new Logger(ResumeService.name);

  constructor(
    private readonly resumeAnalysisAgent: ResumeAnalysisAgent,
    private readonly pdfParserService: PdfParserService,
    private readonly roleMatcher: RoleMatcherTool,
  ) {}

  /**
   * Extract text from an uploaded PDF and analyze it
   */
  async analyzeUpload(
    buffer: Buffer,
    fileName: string,
    options: AnalyzeOptionsDto,
  ): Promise<ResumeAnalysisResponse> {
    this.logger.log(`Analyzing uploaded resume: ${fileName}`);

    try {
      const extracted = await this.pdfParserService.parsePdfBuffer(buffer, fileName);
      const result = await this.resumeAnalysisAgent.analyze({
        text: extracted.text,
        readable: extracted.readable,
        sourceByteSize: extracted.byteSize,
        targetRoleId: options.targetRole,
        includeNarrative: options.includeNarrative,
        narrativeTimeoutMs: options.narrativeTimeoutMs,
      });

      return {
        document: {
          fileName: extracted.fileName,
          numPages: extracted.numPages,
          byteSize: extracted.byteSize,
          readable: extracted.readable,
        },
        result,
      };
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  async analyzeText(dto: AnalyzeTextDto): Promise<ResumeAnalysisResponse> {
    try {
      const result = await this.resumeAnalysisAgent.analyze({
        text: dto.text,
        readable: dto.readable ?? true,
        targetRoleId: dto.targetRole,
        includeNarrative: dto.includeNarrative,
        narrativeTimeoutMs: dto.narrativeTimeoutMs,
      });
      return { document: null, result };
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  listRoles(): RoleProfile[] {
    return this.roleMatcher.roles;
  }

  private toHttpException(error: unknown): unknown {
    if (error instanceof UnknownRoleError) {
      return new HttpException(error.message, HttpStatus.BAD_REQUEST);
    }
    if (error instanceof DocumentTooLargeError) {
      return new HttpException(error.message, HttpStatus.PAYLOAD_TOO_LARGE);
    }
    if (error instanceof DocumentParseError) {
      return new HttpException(error.message, HttpStatus.UNPROCESSABLE_ENTITY);
    }
    return error;
  }
}
