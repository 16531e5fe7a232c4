/**
 * pagewise - Paging Domain
 */

export {
  createPageLoader,
  type PageLoader,
  type PageLoaderConfig,
  type PageLoaderOptions,
} from "./loader";

export { fromAdapter } from "./adapter";
