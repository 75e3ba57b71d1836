/**
 * Commands module - one function per CLI command, each returning an exit code
 */

export type { CommandEnvironment } from './command-environment';
export { cliFlagsFrom, logLevelFor } from './command-environment';
export { runWorkflow } from './run-workflow';
export { startWorkflow } from './start';
export type { StartOptions } from './start';
export { resumeWorkflow } from './resume';
export { showStatus, listWorkflows, formatWorkflowStatus } from './status';
export { recoverWorkflows, findRecoverableWorkflows } from './recover';
export type { RecoverableWorkflow } from './recover';
export { initConfig } from './init-config';
export { dispatchCommand } from './dispatch';
