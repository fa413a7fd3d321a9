export * from './core/errors';
export * from './core/logger';
export * from './core/context';
export * from './core/models';
export * from './core/parser';
export * from './core/instruction-store';
export * from './core/prompt-manager';
export * from './core/reasoning';
export * from './core/executor';
export * from './core/machine';
export * from './core/orchestrator';
export * from './core/config';
export type { PromptContext, ReplyMarker } from './core/types/context';
export * from './shell/reasoning-client';
export * from './shell/runner';
export * from './shell/bootstrap';
export * from './eval/step-validator';
export * from './eval/cases';
export * from './eval/suite';
