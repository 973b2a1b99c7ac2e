export {
  isSessionExpired,
  selectSessionsToEvict,
  type Session,
  type DeactivationReason,
} from './session';
export {
  CredentialError,
  type SessionRepository,
  type BoardRepository,
  type OrganizationDirectory,
  type TokenService,
  type DomainLogger,
  type WithTransaction,
} from './ports';
export {
  SessionAdmissionController,
  SessionAuthError,
  type SessionAdmissionDeps,
  type SessionAuthErrorKind,
} from './session-admission';
export { SessionService, SessionError, type SessionServiceDeps } from './session-service';
export {
  parseRoomId,
  directRoomId,
  directChatRoomId,
  type RoomAddress,
  type RoomKind,
} from './room';
export { RoomAccessPolicy, type RoomAccessDeps } from './room-access';
export {
  compareReceipts,
  supersedes,
  sortBoard,
  type Board,
  type Card,
  type CardChanges,
  type CardPriority,
  type Column,
  type ColumnChanges,
  type BoardMutation,
  type MutationOutcome,
  type Receipt,
} from './board';
