// src/registry/index.ts — Artifact Registry Barrel Exports

// Types & constants
export {
  type Address,
  type Hash,
  type Hex,
  type ArtifactRecord,
  type ArtifactView,
  type RoyaltyQuote,
  type RegistryOptions,
  MAX_SUPPLY,
  MINT_PRICE_WEI,
  MAX_LAYERS_PER_ARTIFACT,
  MINT_COOLDOWN_BLOCKS,
  MAX_ROYALTY_BPS,
  BPS_DENOMINATOR,
  FIRST_TOKEN_ID,
  DEFAULT_ROYALTY_BPS,
  NULL_ADDRESS,
  isNullAddress,
  sameAddress,
} from "./types.js"

// Errors
export {
  type RegistryErrorCode,
  type RegistryErrorCategory,
  type RegistryHttpStatus,
  RegistryError,
  isRegistryError,
} from "./errors.js"

// Facts
export {
  type RegistryEvent,
  type RegistryEventType,
  type RegistryEventListener,
  type CommitInfo,
  type WireRegistryEvent,
  EventBuffer,
  toWireEvent,
} from "./events.js"

// Components
export { Journal, type UndoEntry } from "./journal.js"
export { SingleFlightGuard } from "./single-flight.js"
export { IdentityLedger } from "./identity-ledger.js"
export { DelegationTable } from "./delegation-table.js"
export { TransferAuthorizer } from "./transfer-authorizer.js"
export { ArtifactRecordStore } from "./artifact-store.js"
export { MintGate, type MintRequest } from "./mint-gate.js"
export { RoyaltyPolicy } from "./royalty-policy.js"
export { ReceiverDirectory, ARTIFACT_RECEIVED_SELECTOR, type ArtifactReceiver } from "./receiver.js"
export {
  INTERFACE_ID_ERC165,
  INTERFACE_ID_ERC721,
  INTERFACE_ID_ERC2981,
  INTERFACE_ID_INVALID,
  interfaceIdOf,
  supportsInterface,
} from "./interfaces.js"
export { type BlockClock, WallClockBlockClock, ManualBlockClock } from "./clock.js"

// Aggregate
export { ArtifactRegistry, type RegistryDeps } from "./registry.js"

// Observability
export {
  type RegistryOperation,
  type RegistryLogger,
  createRegistryLogger,
  createSilentLogger,
} from "./logger.js"
export { RegistryEventSink, type EventSinkOptions } from "./event-sink.js"

// Recovery
export {
  WireFact,
  fromWireEvent,
  replayRegistryLog,
  RegistryReplayError,
  type RegistryReplayOptions,
  type RegistryReplayResult,
} from "./replay.js"
