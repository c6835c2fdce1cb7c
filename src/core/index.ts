// Core types
export * from './types.js';

// Names
export {
  stripTypePrefix, qualifyName, displayName, normalizeProfileName, coreName, coreNameEquals,
  inheritsFrom, isPrivatized, privatizeName, sanitizeFilename, filenameFor, findUnsafeFilenameChars,
} from './names.js';
export type { NormalizedName } from './names.js';

// Parsers
export {
  parseStanzas, parseProfileFile, scanStanzas, serializeStanzas, serializeProfile, writeProfileFile,
  formatHeader, formatProperties, sortProperties, retainedComments, cleanLine, defaultProfileName,
  parseBundleText, readBundleFile, parseVendorStanza, serializeBundleFile, formatBundleHeader, writeBundleFile,
  mergeVendorInfo,
} from './parser/index.js';
export type { ScanOptions, SerializeOptions, BundleDocument } from './parser/index.js';

// Corpus
export { listProfileFiles, loadProfileFiles, loadCorpus, loadBundleProfiles, mergeCorpora, groupByFile } from './corpus.js';
export type { Corpus } from './corpus.js';

// Inheritance
export {
  directChildren, findDescendants, findParent, ancestorChain,
  commonProperties, sharedInherits, NEVER_HOIST_KEYS,
  classifyProfiles, referencesProfile,
} from './inheritance/index.js';
export type { Classification } from './inheritance/index.js';

// Bundling
export { bundleProfiles, combineProfiles } from './bundle/index.js';
export type { BundleOptions, CombineOptions } from './bundle/index.js';

// Cleaning
export { inheritedClosure, cleanProfile, cleanProfileDir, cleanBundleFile } from './clean/index.js';
export type { CleanDirOptions, CleanBundleOptions } from './clean/index.js';

// Filters, values, updates
export { filterValues, matchesFilter, selectProfiles, normalizeLength, isEmptyFilter } from './filter.js';
export { parseValue, parseAdjustment, applyAdjustment, formatValue, ValueFormatError } from './value.js';
export type { NumericValue, Adjustment, Decimal, Unit } from './value.js';
export { parseUpdateExpression, previewUpdates, applyUpdates } from './update.js';
export type { PropertyUpdate, UpdatePreview } from './update.js';

// Config
export { resolveConfig, saveConfig, readSavedConfig, profileDirFor, getConfigPath, CONFIG_FILE } from './config.js';
export type { SavedConfig, ConfigOverrides } from './config.js';
