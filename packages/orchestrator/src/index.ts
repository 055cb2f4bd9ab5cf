/**
 * @parley/orchestrator - The voice-gated conversation loop.
 *
 * @packageDocumentation
 */

export { CycleOrchestrator, DEFAULT_ORCHESTRATOR_SETTINGS } from './orchestrator.js';
export { StopPhraseMonitor } from './monitor.js';
export { Narrator } from './narrator.js';
export { PROMPTS } from './prompts.js';
export type { CycleOrchestratorOptions, OrchestratorSettings } from './orchestrator.js';
export type { StopPhraseMonitorOptions } from './monitor.js';
export type { NarratorOptions } from './narrator.js';
export type { PromptSet } from './prompts.js';
