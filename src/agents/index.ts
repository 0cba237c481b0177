export {
    ParticipantDirectory,
    updateWithRetry,
    type Participant,
    type RoleAssignment,
    type AgentResult,
} from './base.js';
export { ScriptedParticipant, PROGRESS_KEY, resultKey, type ScriptedParticipantOptions } from './scripted.js';
