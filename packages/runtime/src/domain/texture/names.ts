const asciiLower = (value: string): string => value.replace(/[A-Z]/g, (c) => c.toLowerCase());

/** `body/def_mario_001_col.nutexb` -> `body/def_mario_001_col`. Only the last extension is removed. */
export const stripExtension = (fileName: string): string => {
  const slash = Math.max(fileName.lastIndexOf('/'), fileName.lastIndexOf('\\'));
  const dot = fileName.lastIndexOf('.');
  // A leading dot names the file rather than starting an extension.
  if (dot <= slash + 1) return fileName;
  return fileName.slice(0, dot);
};

export const textureNameMatches = (fileName: string, textureValue: string): boolean =>
  asciiLower(stripExtension(fileName)) === asciiLower(textureValue);
