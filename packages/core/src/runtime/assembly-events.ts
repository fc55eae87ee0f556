export type AssemblyStage = 'loading' | 'resolution' | 'merge' | 'linking' | 'materialization';

export interface AssemblyStageEvent {
  readonly stage: AssemblyStage;
  readonly timestamp: Date;
  readonly attributes?: Readonly<Record<string, unknown>>;
}

export interface AssemblyErrorEvent {
  readonly stage: AssemblyStage;
  readonly timestamp: Date;
  readonly error: unknown;
}

export interface DomainEvent<Type extends string, Payload> {
  readonly type: Type;
  readonly payload: Payload;
}

export type AssemblyStageStartedEvent = DomainEvent<'stage:start', AssemblyStageEvent>;
export type AssemblyStageCompletedEvent = DomainEvent<'stage:complete', AssemblyStageEvent>;
export type AssemblyStageErroredEvent = DomainEvent<'stage:error', AssemblyErrorEvent>;

export type AssemblyEvent =
  | AssemblyStageStartedEvent
  | AssemblyStageCompletedEvent
  | AssemblyStageErroredEvent;
