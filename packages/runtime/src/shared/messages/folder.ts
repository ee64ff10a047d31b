export const FOLDER_NOT_FOUND = (index: number) => `Model folder #${index} is not open.`;
export const FOLDER_FILE_NOT_FOUND = (kind: string, index: number) => `No ${kind} file at slot #${index}.`;
export const FOLDER_FILE_NOT_PARSED = (fileName: string) => `${fileName} could not be read and cannot be edited.`;
export const MATL_ENTRY_NOT_FOUND = (index: number) => `Material entry #${index} does not exist.`;
export const MATL_SHADER_UNRESOLVED = (shaderLabel: string) =>
  `Shader label "${shaderLabel}" does not match any program in the shader database.`;
export const MATL_NO_MISSING_PARAMETERS = (materialLabel: string) =>
  `Material "${materialLabel}" already defines every parameter its shader requires.`;
export const MATL_NO_UNUSED_PARAMETERS = (materialLabel: string) =>
  `Material "${materialLabel}" has no parameters its shader ignores.`;
