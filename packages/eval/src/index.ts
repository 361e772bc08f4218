// Ground truth
export { FileTreeSchema, computeRequiredPaths, getGroundTruth, isTestFile, listFiles } from './ground-truth'
export type { FileTree, GroundTruth, TargetPredicate } from './ground-truth'

// Listing parsing
export { extractNumbers, normalizePath, parseListing } from './listing'
export type { ParsedListing } from './listing'

// Validation
export { TraceValidator, computeMetrics, extractFinalAnswer, validateTrace } from './validator'
export type {
    CheckName,
    CheckResult,
    TraceMetrics,
    TraceValidatorOptions,
    ValidateTraceOptions,
    ValidationReport,
    Violation,
    Warning,
} from './validator'

// Scenarios
export {
    MockListDirectoryInput,
    createMockListDirectoryTool,
    loadFilesystem,
    loadPrompt,
} from './mock-tools'
export type { MockFilesystemDependencies } from './mock-tools'

// Runner
export { formatReport, runEvaluation } from './runner'
export type { EvaluationOptions, EvaluationOutcome } from './runner'
