/**
 * Requirements of one compiled shader program, keyed in a database by the
 * first 24 characters of a material's shader label.
 *
 * `materialParameters` keeps the database's declared order. Each entry is a
 * parameter name optionally followed by the channels the shader reads,
 * for example `CustomVector11.xyz`.
 */
export interface ShaderProgram {
  materialParameters: string[];
  vertexAttributes: string[];
  discard: boolean;
}

export type ShaderProgramRecord = ShaderProgram & {
  name: string;
};

export type ChannelMask = [boolean, boolean, boolean, boolean];
