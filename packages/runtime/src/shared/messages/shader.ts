export const SHADER_DATABASE_NOT_OBJECT = 'Shader database must be a JSON object.';
export const SHADER_DATABASE_PROGRAMS_MISSING = 'Shader database must contain a "programs" array.';
export const SHADER_PROGRAM_INVALID = (index: number) =>
  `Shader program #${index} must have a name, materialParameters and vertexAttributes.`;
export const SHADER_DATABASE_READ_FAILED = (filePath: string, reason: string) =>
  `Failed to read shader database ${filePath}: ${reason}`;
export const SHADER_DATABASE_PARSE_FAILED = (filePath: string, reason: string) =>
  `Shader database ${filePath} is not valid JSON: ${reason}`;
