export type ProfileType = 'print' | 'filament';

export type StanzaType = ProfileType | 'printer' | 'printer_model';

export const PROFILE_TYPES: readonly ProfileType[] = ['print', 'filament'];

export const STANZA_TYPES: readonly StanzaType[] = ['print', 'filament', 'printer', 'printer_model'];

export type ProfileProperties = Record<string, string>;

export interface Profile {
  filePath: string;
  type: StanzaType;
  /** Qualified name, always `"<type>: <display name>"`. */
  name: string;
  properties: ProfileProperties;
  comments: string[];
  lines: string[];
}

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  file?: string;
  profile?: string;
}

export interface ParseResult {
  profiles: Profile[];
  diagnostics: Diagnostic[];
}

export interface VendorInfo {
  repoId: string;
  configVersion: string;
}

export type ProfileFilter =
  | { type: 'print'; tag?: string; layerHeight?: string; nozzle?: string }
  | { type: 'filament'; filamentType?: string; vendor?: string };

export interface ProfileChange {
  profile: string;
  file: string;
  removed: string[];
}

export interface CombineResult {
  parentFile: string;
  parentName: string;
  inherits?: string;
  commonProperties: ProfileProperties;
  filesUpdated: string[];
  diagnostics: Diagnostic[];
}

export type BundleResult =
  | {
    status: 'nothing-to-bundle';
    bundleFile: string;
    leaves: string[];
    diagnostics: Diagnostic[];
  }
  | {
    status: 'bundled';
    bundleFile: string;
    parentName: string;
    parentCreated: boolean;
    commonPropertyCount: number;
    renamed: Record<string, string>;
    moved: string[];
    skipped: string[];
    leaves: string[];
    filesUpdated: string[];
    filesDeleted: string[];
    diagnostics: Diagnostic[];
  };

export interface CleanResult {
  type: ProfileType;
  profileDir: string;
  filesProcessed: number;
  filesChanged: string[];
  propertiesRemoved: number;
  changes: ProfileChange[];
  diagnostics: Diagnostic[];
}

export interface BundleCleanResult {
  bundleFile: string;
  types: StanzaType[];
  changed: boolean;
  parentsCreated: string[];
  propertiesRemoved: number;
  profilesChanged: number;
  hoisted: Record<string, ProfileProperties>;
  externalFilesChanged: string[];
  diagnostics: Diagnostic[];
}

export interface PropertyChange {
  property: string;
  oldValue?: string;
  newValue: string;
}

export interface UpdateResult {
  changes: { profile: string; file: string; changes: PropertyChange[] }[];
  filesWritten: string[];
  diagnostics: Diagnostic[];
}

export interface ProfmanConfig {
  projectRoot: string;
  printDir: string;
  filamentDir: string;
  vendorDir: string;
  vendor: VendorInfo;
  warnings: string[];
}

export const DEFAULT_VENDOR: VendorInfo = {
  repoId: 'non-prusa-fff',
  configVersion: '2.1.0',
};
