/**
 * Shared context for a task's team: the versioned store, its durable backends
 * and the handoff protocol used when a member is replaced.
 */

export {
    SharedContextStore,
    AgentContextHandle,
    type SharedContextStoreOptions,
    type SubscribeOptions,
    type ContextSnapshot,
    type VersionComparison,
    type HandoffReceipt,
} from './context-store.js';

export {
    MemoryContextBackend,
    SqliteContextBackend,
    type ContextBackend,
    type ContextDraft,
} from './context-backend.js';

export { HandoffManager, type HandoffInfo, type HandoffStatus } from './handoff-manager.js';
