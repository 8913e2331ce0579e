export {
  CatalogMessageResolver,
  type CatalogResolverOptions,
  createCatalogResolver,
  type MessageCatalog,
} from "./adapters/memory/catalog-resolver"
export { defineClassifications } from "./core/classifications"
export {
  type LoadStatusConfigOptions,
  loadStatusConfig,
  type StatusConfig,
  statusEnvSchema,
} from "./core/config/load-status-config"
export {
  type ContextFields,
  contextFloat,
  contextMap,
  formatValue,
  isContextValue,
  toContextValue,
} from "./core/context/context-value"
export { StatusContext } from "./core/context/status-context"
export { statusFromJSON } from "./core/json/parse-status"
export { serializeStatus, serializeValue } from "./core/json/serialize-status"
export {
  DEFAULT_UNKNOWN_MARKER,
  formatReport,
  genericMessage,
  type RenderChainOptions,
  type RenderOptions,
  render,
  renderChain,
} from "./core/render/render"
export { Status, type StatusOptions, UNRECOGNIZED_ID, type WrapOptions } from "./core/status"
export { ensure } from "./core/utils/ensure"
export { isStatus } from "./core/utils/is-status"
export { err, ok } from "./core/utils/result"
export { type ChainOptions, rootStatus, statusChain } from "./core/utils/status-chain"
export { toStatus } from "./core/utils/to-status"
export { DecodeError, type DecodeErrorCode } from "./core/wire/decode-error"
export {
  createConfiguredWireCodec,
  createWireCodec,
  type WireCodecOptions,
  WireStatusCodec,
} from "./core/wire/wire-codec"
export { WIRE_VERSION } from "./core/wire/wire-format"
export * from "./ports/classification"
export type * from "./ports/codec"
export type * from "./ports/context-value"
export type * from "./ports/message-resolver"
export type * from "./ports/result"
export type * from "./ports/serialized-status"
