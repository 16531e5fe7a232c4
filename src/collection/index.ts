/**
 * pagewise - Collection Domain
 */

export {
  createPagedCollection,
  type PagedCollection,
  type PagedCollectionConfig,
} from "./controller";

export {
  createSequence,
  isItemEntry,
  isFooterEntry,
  type Sequence,
  type FooterPlacement,
} from "./sequence";
