/**
 * rtdb-replica
 *
 * Live, eventually-consistent local replicas of a hierarchical realtime JSON
 * database, kept current over its push-event stream, with a TanStack DB
 * collection adapter on top.
 *
 * @packageDocumentation
 * @module rtdb-replica
 */

// ============================================================================
// Client
// ============================================================================

export { createReplicaClient } from './client.js'
export type { ReplicaClient } from './client.js'
export { resolveConfig, EMULATOR_HOST_ENV } from './config.js'
export type { ReplicaClientConfig, ResolvedConfig } from './config.js'

// ============================================================================
// Paths, Queries and Tree Values
// ============================================================================

export { Path, isValidKey } from './path/path.js'
export { QueryBuilder, QuerySpec, query } from './query/query-spec.js'
export type { BoundValue, OrderBy, QueryField } from './query/query-spec.js'
export { applyPatch, applyPut, readAt } from './tree/patch-engine.js'
export type { PatchData } from './tree/patch-engine.js'
export { isTreeMapping, toTreeValue, treeEquals } from './tree/tree-value.js'
export type { TreeMapping, TreeScalar, TreeValue } from './tree/tree-value.js'

// ============================================================================
// Streaming
// ============================================================================

export { FrameDecoder, decodeFrames } from './stream/frame-decoder.js'
export type { Frame } from './stream/frame-decoder.js'
export { FetchStreamTransport, buildStreamUrl } from './stream/transport.js'
export type {
  FetchLike,
  FetchStreamTransportOptions,
  StreamRequest,
  StreamResponse,
  StreamTransport,
} from './stream/transport.js'

// ============================================================================
// Sessions
// ============================================================================

export { ReplicaSession } from './sync/replica-session.js'
export type { AuthMode, ReconnectPolicy, ReplicaSessionOptions } from './sync/replica-session.js'
export { SessionSupervisor } from './sync/supervisor.js'
export type {
  RetryPolicy,
  SessionSupervisorOptions,
  SupervisedSession,
  SupervisorStats,
} from './sync/supervisor.js'
export { EventChannel } from './sync/event-channel.js'
export type { EventChannelStats } from './sync/event-channel.js'
export { calculateDelay } from './sync/backoff.js'
export type { BackoffPolicy } from './sync/backoff.js'

export { FINAL_STATES, isDataEvent, isTerminalEvent } from './types/events.js'
export type {
  AuthRevokedEvent,
  CancelEvent,
  ChangeEvent,
  ChangeEventKind,
  FaultEvent,
  KeepAliveEvent,
  PatchEvent,
  PatchMapping,
  PutEvent,
  ReplicaHandle,
  ReplicaSnapshot,
  SessionState,
  StateChange,
  StateListener,
  TerminalEvent,
} from './types/events.js'

// ============================================================================
// Credentials
// ============================================================================

export {
  RefreshingCredentials,
  anonymousCredentials,
  staticCredentials,
} from './auth/credentials.js'
export type {
  CredentialAccessor,
  RefreshMetrics,
  RefreshingCredentialsConfig,
} from './auth/credentials.js'

// ============================================================================
// Errors and Logging
// ============================================================================

export {
  AccessRevokedError,
  AuthFailureError,
  ConnectionError,
  HttpStatusError,
  InvalidConfigError,
  InvalidPathError,
  InvalidQueryError,
  InvalidValueError,
  MalformedFrameError,
  ProtocolViolationError,
  RtdbError,
  isRecoverableError,
  toRtdbError,
} from './errors.js'
export type { DebugLogger, DebugOption } from './logger.js'

// ============================================================================
// TanStack DB
// ============================================================================

export { replicaCollectionOptions, toRow } from './collection/replica-collection.js'
export type {
  ReplicaCollectionConfig,
  ReplicaCollectionOptions,
} from './collection/replica-collection.js'
export type { ChangeMessage, SyncParams, SyncReturn } from './types/collection.js'
