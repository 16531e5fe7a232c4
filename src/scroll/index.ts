/**
 * pagewise - Scroll Domain
 */

export {
  createScrollSource,
  calculateLastVisibleIndex,
  type ScrollSource,
  type ScrollSourceConfig,
} from "./source";
