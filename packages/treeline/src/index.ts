export { token, tokenGroup, isToken } from './core/token.js';
export type { CanonicalId, Token } from './core/token.js';

export { WeakRegistry } from './core/weak-registry.js';
export {
  provide,
  providesToken,
  valueOf,
  publish,
  hasPublished,
  unpublish,
  listen,
  stopListening,
  subscriberCount,
} from './core/provider.js';
export type { ProviderRegistration } from './core/provider.js';
export { DependencySlot } from './core/slot.js';
export { Dependent, dependent, isDependent, peekSlot } from './core/dependent.js';
export type { PendingAttachment } from './core/dependent.js';
export { Resolver } from './core/resolver.js';
export { Attachment, LifecycleGate } from './core/lifecycle-gate.js';
export { invalidate, release } from './core/release.js';

export { FallbackRegistry } from './registry/fallback-registry.js';

export { Node } from './tree/node.js';

export { Machine } from './state/machine.js';
export type {
  MachineListener,
  MachineOptions,
  MachineState,
  ReadOnlyMachine,
} from './state/machine.js';
export { Notifier } from './state/notifier.js';
export type {
  NotifierListener,
  NotifierOptions,
  ReadOnlyNotifier,
  UpdatedListener,
} from './state/notifier.js';
export { valueEquals } from './state/equality.js';
export type { Equality } from './state/equality.js';

export { SlotSource } from './types/types.js';
export type {
  GateOptions,
  PublishListener,
  ReadyCallback,
  ResolverOptions,
  TreeNode,
} from './types/types.js';

export { AssertionError, ConsoleLog, defaultLog, silentLog } from './log/log.js';
export type { Log } from './log/log.js';

// Errors
export {
  InvalidStateTransitionError,
  InvalidTokenError,
  NoDependencySlotsError,
  ProviderNotFoundError,
  TreeStructureError,
  UnexpectedBindingTypeError,
} from './errors/errors.js';
