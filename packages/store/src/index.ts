/**
 * @shortbox/store - In-memory link store
 *
 * Registry + owner index, mailbox and expiration sweeper behind one
 * injectable `LinkStore`.
 */

export { LinkStore, createLinkStore, type LinkStoreOptions } from "./store.js";

export {
  LinkRegistry,
  expiredMessage,
  limitReachedMessage,
  type LinkRegistryOptions,
  type CreateLinkResult,
  type ResolveLinkResult,
  type ConsumeLinkResult,
  type DeleteLinkResult,
} from "./link-registry.js";

export { OwnerIndex } from "./owner-index.js";
export { Mailbox, type MailboxOptions } from "./mailbox.js";
export { ExpirationSweeper, type SweeperOptions } from "./sweeper.js";

export {
  loadStoreConfig,
  validateStoreConfig,
  optional,
  optionalInt,
  DEFAULT_STORE_CONFIG,
  type StoreConfig,
} from "./config.js";

export {
  systemClock,
  type Clock,
  type StoreLogger,
  type Notifier,
  type CreateLinkInput,
  type ConsumedLink,
} from "./types.js";
