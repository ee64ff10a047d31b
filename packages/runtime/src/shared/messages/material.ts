export const MATL_DOCUMENT_INVALID = 'Material document must be an object with an "entries" array.';
export const MATL_ENTRY_INVALID = (index: number) => `Material entry #${index} is malformed.`;
export const PRESETS_WRITE_FAILED = (filePath: string) => `Failed to write default presets to ${filePath}`;
export const PRESETS_LOAD_FAILED = (filePath: string) => `Failed to load presets from ${filePath}`;
