export { Plan, loadPlan } from './plan.js';
export type { PlanOptions, LoadPlanOptions } from './plan.js';
export { Result, RESULT_OUTCOMES, RESULT_INTERPRETATIONS } from './result.js';
export type { ResultOutcome, ResultInterpretation, ResultRecord, ResultData } from './result.js';
export { Test, StaticDiscover, DEFAULT_TEST_DURATION } from './discover/index.js';
export type { Discover, TestMetadata, TestFramework } from './discover/index.js';
export { LocalGuest } from './guest/local.js';
export type { LocalGuestOptions } from './guest/local.js';
export type { Guest, GuestRunResult, PushOptions, RunOptions } from './guest/types.js';
export { Plugin, MethodRegistry } from './steps/plugin.js';
export type { StepContext, PluginFactory } from './steps/plugin.js';
export { Step } from './steps/step.js';
export type { PlanContext, StepData, RawStepData, StepStatus } from './steps/types.js';
export {
  Execute,
  ExecutePlugin,
  ExecuteInternal,
  builtinExecuteMethods,
  normalizeExecuteData,
  DEFAULT_EXECUTE_METHOD,
  DEFAULT_FRAMEWORK,
} from './steps/execute/index.js';
export type { ExecuteContext, ExecuteMethods, Script } from './steps/execute/index.js';
export { defineScript } from './steps/execute/script.js';
export { Report, ReportPlugin, ReportDisplay, ReportYaml, builtinReportMethods } from './steps/report/index.js';
export type { ReportContext, ReportMethods } from './steps/report/index.js';
export { parsePlanConfig, loadPlanConfig } from './config/loader.js';
export type { PlanConfig } from './config/loader.js';
export { GuestrunError, GuestrunErrorCode } from './shared/errors.js';
export { PROCESS_TIMEOUT } from './shared/exec.js';
export { logger } from './shared/logger.js';
