export {
  parseStanzas, parseProfileFile, scanStanzas, serializeStanzas, serializeProfile, writeProfileFile,
  formatHeader, formatProperties, sortProperties, retainedComments, cleanLine, defaultProfileName,
} from './ini.js';
export type { ScanOptions, SerializeOptions } from './ini.js';
export {
  parseBundleText, readBundleFile, parseVendorStanza, serializeBundleFile, formatBundleHeader, writeBundleFile, mergeVendorInfo,
} from './vendor.js';
export type { BundleDocument } from './vendor.js';
