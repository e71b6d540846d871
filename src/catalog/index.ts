/**
 * Catalog Module
 */

export {
  BUNDLED_CATALOG_PATH,
  CatalogLoadError,
  parseCatalogRecords,
  loadCatalogFile,
  loadCatalog,
} from './catalog-loader.js';
