export * from './types';
export { CatalogError, AnnotatorError } from './errors';
export { CFG, DEFAULT_CATALOG_PATH } from './config';
export { loadCatalog, loadCatalogFile } from './catalog/loadCatalog';
export { CatalogHandle, type ReloadListener } from './catalog/catalogHandle';
export { NaturalAnnotator, tokenize, type Annotator } from './nlp/annotator';
export { lemmaOf } from './nlp/lemma';
export { detectAmbiguities, isUnresolvedReference } from './engine/ambiguity';
export { detectAssumptions } from './engine/assumption';
export { scoreFindings, classifyReadiness, readinessFrom, ambiguityConfidence } from './engine/scorer';
export { suggest } from './engine/suggest';
export { classifyStatement } from './engine/classify';
export { RequirementAnalyzer, createAnalyzer, toReport, type AnalyzerOptions } from './engine/analyzer';
