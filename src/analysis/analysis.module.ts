import { Module, Global, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ScoringConfig } from '../common/interfaces';
import {
  DEFAULT_SCORING_CONFIG_DIR,
  loadScoringConfig,
} from '../config/scoring-config.loader';

// Services
import { LLMConfig, LLMService } from './services/llm.service';
import { NarrativeService } from './services/narrative.service';
import { PdfParserService, UploadConfig } from './services/pdf-parser.service';
import { TextNormalizerService } from './services/text-normalizer.service';
import { SectionSegmenterService } from './services/section-segmenter.service';
import { QuantificationDetectorService } from './services/quantification-detector.service';
import { EntityExtractorService } from './services/entity-extractor.service';

// Tools
import { CategoryScorerTool } from './tools/category-scorer.tool';
import { AggregateScorerTool } from './tools/aggregate-scorer.tool';
import { RoleMatcherTool } from './tools/role-matcher.tool';
import { StrengthWeaknessTool } from './tools/strength-weakness.tool';

// Agents
import { ResumeAnalysisAgent } from './resume-analysis.agent';

@Global()
@Module({
  providers: [
    // Configuration
    {
      provide: 'SCORING_CONFIG',
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ScoringConfig => {
        const dir = configService.get<string>('SCORING_CONFIG_DIR', DEFAULT_SCORING_CONFIG_DIR);
        const config = loadScoringConfig(dir);
        new Logger(AnalysisModule.name).log(
          `Loaded scoring tables from ${dir}: ${config.taxonomy.length} skills, ${config.roles.length} roles`,
        );
        return config;
      },
    },
    {
      provide: 'LLM_CONFIG',
      inject: [ConfigService],
      useFactory: (configService: ConfigService): LLMConfig => ({
        hfToken: configService.get<string>('HF_TOKEN'),
        llmModel: configService.get<string>(
          'LLM_MODEL',
          'mistralai/Mistral-7B-Instruct-v0.3',
        ),
        maxNewTokens: configService.get<number>('NARRATIVE_MAX_TOKENS', 900),
        timeoutMs: configService.get<number>('NARRATIVE_TIMEOUT_MS', 8000),
      }),
    },
    {
      provide: 'UPLOAD_CONFIG',
      inject: [ConfigService],
      useFactory: (configService: ConfigService): UploadConfig => ({
        maxUploadBytes: configService.get<number>('MAX_UPLOAD_BYTES', 10 * 1024 * 1024),
        minCharsPerPage: configService.get<number>('MIN_CHARS_PER_PAGE', 40),
      }),
    },
    {
      provide: 'NARRATIVE_CAPABILITY',
      inject: [NarrativeService, 'LLM_CONFIG'],
      useFactory: (narrativeService: NarrativeService, llmConfig: LLMConfig) =>
        narrativeService.createCapability(llmConfig.timeoutMs),
    },

    // Services
    LLMService,
    NarrativeService,
    PdfParserService,
    TextNormalizerService,
    SectionSegmenterService,
    QuantificationDetectorService,
    EntityExtractorService,

    // Tools
    CategoryScorerTool,
    AggregateScorerTool,
    RoleMatcherTool,
    StrengthWeaknessTool,

    // Agents
    ResumeAnalysisAgent,
  ],
  exports: [
    'SCORING_CONFIG',
    'UPLOAD_CONFIG',
    PdfParserService,
    NarrativeService,
    RoleMatcherTool,
    ResumeAnalysisAgent,
  ],
})
export class AnalysisModule {}
