export { loadConfig, parseConfig, getDefaultConfig, ConfigError, ProvisionerConfigSchema } from "./config/config.js";
export type { ProvisionerConfig, ProvisionerConfigInput } from "./config/config.js";
export { GcloudProvider } from "./gcp/provider.js";
export { ProviderCommandError, runGcloud } from "./gcp/cli-wrapper.js";
export { decodeCredentialRefs, decodeCredentialValue } from "./gcp/decoder.js";
export { createProvisionLogger, createMemoryLogger } from "./logging/logger.js";
export type { ProvisionLogger, LogLevel } from "./logging/logger.js";
export { HealthMonitor } from "./provisioning/health.js";
export { ProvisioningPipeline, createProvisioningPipeline } from "./provisioning/pipeline.js";
export type { PipelineEvent, PipelineResult, StageReport, StartStage } from "./provisioning/pipeline.js";
export { buildReport, exitCodeForReport, formatReport } from "./provisioning/report.js";
export { CredentialSink } from "./provisioning/result-sink.js";
export { RetryExecutor, classifyError } from "./provisioning/retry.js";
export { createRunContext, withRunContext } from "./provisioning/run-context.js";
export type { RunContext } from "./provisioning/run-context.js";
export { runBounded } from "./provisioning/runner.js";
export { createStageTasks } from "./provisioning/tasks.js";
export type * from "./provisioning/types.js";
export { generateWorkItems, parseWorkItemList } from "./provisioning/work-items.js";
