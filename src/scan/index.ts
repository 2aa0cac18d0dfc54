export { listRepositories } from "./repositories.js";
export type { ListRepositoriesOptions } from "./repositories.js";
export { walkRepository, readTextFile, matchesExtension, shouldExcludeDir } from "./walker.js";
export { extractMarkers } from "./extractor.js";
export { createClassifier, DEFAULT_CLASSIFIER_CONFIG } from "./classifier.js";
export type { Classifier, ClassifierConfig } from "./classifier.js";
export * from "./types.js";
