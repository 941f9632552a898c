/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Primitives
export {
    FINDING_ID_PATTERN,
    PERCENTAGE_PATTERN,
    FindingId,
    PercentageString,
    UnitInterval,
    OpaqueRecord,
    ConfidenceValue,
    toConfidence,
    checkConfidence,
} from "./common.js";
export type { Confidence, ConfidenceProblem } from "./common.js";

// Enumerations
export * from "./enums.js";

// Red-team analysis
export {
    AttackerFinding,
    AttackerOutput,
    GroundingAssessment,
    GroundingOutput,
    ContextAnalysisOutput,
    AttackStrategyOutput,
} from "./attack.js";
export { Finding, RedTeamReport } from "./report.js";
export {
    DiffAnalysisOutput,
    CODE_FINDING_PREFIXES,
    CodeFindingId,
    CodeAttackerFinding,
    CodeAttackerOutput,
    PrFinding,
    PrRedTeamReport,
} from "./pr.js";

// Fix planning and execution
export {
    FixOption,
    FixPlannerOutput,
    FixCoordinatorOutput,
    AskUserQuestion,
    QuestionBatch,
    FixCoordinatorAskUserOutput,
    FixReaderOutput,
    FixPlanV2Output,
    FixRedTeamerOutput,
    FixApplicatorOutput,
    FixCommitterOutput,
    FixValidatorOutput,
    FixPhaseCoordinatorOutput,
    FixOrchestratorOutput,
} from "./fixes.js";

// Context engineering
export {
    PluginAnalysis,
    PluginAnalysisOutput,
    ContextFlowMap,
    ContextFlowMapOutput,
    PlanAnalysis,
    PlanAnalysisOutput,
} from "./analysis.js";
export {
    ContextImprovement,
    OrchestrationImprovement,
    HandoffImprovement,
    ContextImprovementOutput,
    OrchestrationImprovementOutput,
    HandoffImprovementOutput,
} from "./improvement.js";
export {
    PatternCompliance,
    TokenEstimate,
    ConsistencyCheck,
    RiskAssessment,
    ChallengeAssessment,
    GroundedImprovement,
    PatternComplianceOutput,
    TokenEstimateOutput,
    ConsistencyCheckOutput,
    RiskAssessmentOutput,
    ChallengeAssessmentOutput,
} from "./grounding.js";
export { ImprovementReport, ImprovementReportOutput } from "./synthesis.js";

// Session state
export { FileRef, ImmutableState, MutableState, SessionState, MUTABLE_FIELDS } from "./session.js";
export type { MutableField } from "./session.js";

// Configuration
export { ValidatorConfig, CONFIG_ENV_VARS, DEFAULT_CONFIG, configFromEnv } from "./config.js";
export type { ValidatorConfigInput } from "./config.js";
