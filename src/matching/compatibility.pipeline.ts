import { SkillInferenceService } from "../ai/skill-inference.service";
import { MatchingConfig } from "../config/matching-config";
import { Logger, LoggerContext, logContext } from "../config/logger";
import { generateOptimizationAdvice } from "../advisory/advisory.generator";
import { CandidateProfiler } from "../profiles/candidate.profiler";
import { parseCandidateProfile, parseJobRequirementProfile } from "../profiles/profile.schemas";
import { RequirementExtractor } from "../profiles/requirement.extractor";
import { AnalysisTimeoutError, ErrorDescription, describeError } from "../shared/errors";
import {
  CandidateDocumentInput,
  CandidateProfile,
  JobPostingInput,
  JobRequirementProfile,
} from "../shared/types/profile.types";
import { AdvisedCompatibilityReport, AnalysisResult } from "../shared/types/report.types";
import { withTimeout } from "../shared/utils/async.util";
import { deepFreeze } from "../shared/utils/freeze.util";
import { SkillDictionary } from "../skills/skill-dictionary";
import { ScoringContext, calculateCompatibility } from "./scoring/compatibility-score";

export interface AnalysisPair {
  job: JobPostingInput;
  candidate: CandidateDocumentInput;
}

export interface AnalyzeOptions {
  /** Caller deadline for the whole pair. No deadline when omitted. */
  timeoutMs?: number;
  requestId?: string;
}

export type BatchItemResult =
  | { ok: true; result: AnalysisResult }
  | { ok: false; error: ErrorDescription };

export interface PipelineOptions {
  /** Year that open employment ranges end at. Defaults to the current year. */
  referenceYear?: number;
}

/**
 * Orchestrates extraction, inference, scoring and advice for one pair or a
 * batch. The only suspension point is the inference collaborator.
 */
export class CompatibilityPipeline {
  private readonly dictionary: SkillDictionary;
  private readonly extractor: RequirementExtractor;
  private readonly profiler: CandidateProfiler;
  private readonly scoringContext: ScoringContext;

  constructor(
    private readonly config: MatchingConfig,
    private readonly inference: SkillInferenceService,
    private readonly logger: Logger,
    private readonly options: PipelineOptions = {},
  ) {
    this.dictionary = new SkillDictionary(config.dictionary);
    this.extractor = new RequirementExtractor(config, this.dictionary);
    this.profiler = new CandidateProfiler(config, this.dictionary);
    this.scoringContext = {
      weights: config.settings.weights,
      canonicalVerb: (token) => this.dictionary.canonicalVerb(token),
    };
  }

  get dictionaryVersion(): string {
    return this.dictionary.version;
  }

  get configVersion(): string {
    return this.config.settings.version;
  }

  async buildJobProfile(input: JobPostingInput, context: LoggerContext = {}): Promise<JobRequirementProfile> {
    const startedAt = Date.now();
    const spans = this.extractor.spans(input);
    const [required, preferred] = await Promise.all([
      this.inference.propose(spans.required, "job_posting"),
      this.inference.propose(spans.preferred, "job_posting"),
    ]);
    const profile = this.extractor.extract(input, {
      inferred: { required: required.terms, preferred: preferred.terms },
      inferenceDegraded: required.degraded || preferred.degraded,
    });
    logContext(
      this.logger,
      "info",
      "pipeline.job_profile.built",
      {
        ...context,
        stage: "requirement_extraction",
        latency_ms: Date.now() - startedAt,
        inference_degraded: profile.inference_degraded,
      },
      {
        required_skills: profile.required_skills.length,
        preferred_skills: profile.preferred_skills.length,
        experience_level: profile.experience_level,
      },
    );
    return profile;
  }

  async buildCandidateProfile(input: CandidateDocumentInput, context: LoggerContext = {}): Promise<CandidateProfile> {
    const startedAt = Date.now();
    const text = this.profiler.prepare(input.text);
    const inferred = await this.inference.propose(text, "candidate_document");
    const profile = this.profiler.profile(input, {
      inferredSkills: inferred.terms,
      inferenceDegraded: inferred.degraded,
      referenceYear: this.options.referenceYear,
    });
    logContext(
      this.logger,
      "info",
      "pipeline.candidate_profile.built",
      {
        ...context,
        stage: "candidate_profiling",
        latency_ms: Date.now() - startedAt,
        inference_degraded: profile.inference_degraded,
      },
      {
        skills: profile.skills.length,
        experience_level: profile.experience_level,
      },
    );
    return profile;
  }

  /** Synchronous: scores two profiles and attaches the advice derived from the report. */
  scoreProfiles(job: JobRequirementProfile, candidate: CandidateProfile): AdvisedCompatibilityReport {
    const report = calculateCompatibility(job, candidate, this.scoringContext);
    return deepFreeze({
      ...report,
      optimization_advice: generateOptimizationAdvice(report, job, candidate),
    });
  }

  /** Validates profiles received from outside, resolving their skills through the dictionary, then scores them. */
  scoreSubmittedProfiles(jobProfile: unknown, candidateProfile: unknown): AdvisedCompatibilityReport {
    return this.scoreProfiles(
      parseJobRequirementProfile(jobProfile, this.dictionary),
      parseCandidateProfile(candidateProfile, this.dictionary),
    );
  }

  async analyze(pair: AnalysisPair, options: AnalyzeOptions = {}, context: LoggerContext = {}): Promise<AnalysisResult> {
    const work = this.runAnalysis(pair, { ...context, request_id: options.requestId ?? context.request_id });
    const timeoutMs = options.timeoutMs;
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return work;
    }
    return withTimeout(work, timeoutMs, () => new AnalysisTimeoutError(timeoutMs));
  }

  /** Pairs run concurrently; a failing pair is reported in place and never aborts the others. */
  async analyzeBatch(pairs: ReadonlyArray<AnalysisPair>, options: AnalyzeOptions = {}): Promise<BatchItemResult[]> {
    return Promise.all(
      pairs.map(async (pair, index): Promise<BatchItemResult> => {
        const context: LoggerContext = { request_id: options.requestId, pair_index: index };
        try {
          return { ok: true, result: await this.analyze(pair, options, context) };
        } catch (error) {
          const description = describeError(error);
          logContext(this.logger, "warn", "pipeline.batch.pair_failed", {
            ...context,
            stage: description.stage,
            ok: false,
            error_code: description.code,
          });
          return { ok: false, error: description };
        }
      }),
    );
  }

  private async runAnalysis(pair: AnalysisPair, context: LoggerContext): Promise<AnalysisResult> {
    const startedAt = Date.now();
    const [jobProfile, candidateProfile] = await Promise.all([
      this.buildJobProfile(pair.job, context),
      this.buildCandidateProfile(pair.candidate, context),
    ]);
    const report = this.scoreProfiles(jobProfile, candidateProfile);
    logContext(this.logger, "info", "pipeline.analysis.completed", {
      ...context,
      stage: "pipeline",
      latency_ms: Date.now() - startedAt,
      overall_score: report.overall_score,
      inference_degraded: jobProfile.inference_degraded || candidateProfile.inference_degraded,
      ok: true,
    });
    return deepFreeze({
      job_profile: jobProfile,
      candidate_profile: candidateProfile,
      report,
    });
  }
}
