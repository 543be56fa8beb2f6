export {
  InputLoadError,
  FILING_FILES,
  loadTaxonomy,
  loadExtensions,
  loadMapperFile,
  loadFactList,
  loadFilingInput,
  listFilingDirectories,
  type MapperStatements,
  type LoadFilingOptions,
} from './filing.js';
export { RawFactSchema, FactListSchema, TaxonomySchema, ExtensionSchemaFile, MapperFileSchema, type MapperFile } from './schema.js';
