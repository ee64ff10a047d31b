import type { ChannelMask, ParamId, ShaderProgram } from '@ssbh-check/contracts/types/internal';
import type { ShaderProgramLookup } from '../../ports/shaderDatabase';

export const SHADER_LOOKUP_KEY_LENGTH = 24;

const CHANNELS = ['x', 'y', 'z', 'w'] as const;

// Labels look like SFX_PBS_0100000008008269_opaque; the render pass suffix is
// not part of the program name.
export const programLookupKey = (shaderLabel: string): string =>
  shaderLabel.length >= SHADER_LOOKUP_KEY_LENGTH ? shaderLabel.slice(0, SHADER_LOOKUP_KEY_LENGTH) : '';

export const resolveProgram = (lookup: ShaderProgramLookup, shaderLabel: string): ShaderProgram | undefined => {
  const key = programLookupKey(shaderLabel);
  return key ? lookup.get(key) : undefined;
};

/** Splits `CustomVector11.xyz` into `['CustomVector11', 'xyz']`. */
export const splitParam = (raw: string): [string, string] => {
  const dot = raw.indexOf('.');
  if (dot < 0) return [raw, ''];
  return [raw.slice(0, dot), raw.slice(dot + 1)];
};

export const declaredParamNames = (program: ShaderProgram): string[] =>
  program.materialParameters.map((raw) => splitParam(raw)[0]);

export const declaresParam = (program: ShaderProgram, id: ParamId): boolean =>
  program.materialParameters.some((raw) => splitParam(raw)[0] === id);

export const accessedChannels = (program: ShaderProgram, id: ParamId): ChannelMask => {
  const mask: ChannelMask = [false, false, false, false];
  program.materialParameters.forEach((raw) => {
    const [name, channels] = splitParam(raw);
    if (name !== id) return;
    if (!channels) {
      mask.fill(true);
      return;
    }
    CHANNELS.forEach((channel, i) => {
      if (channels.includes(channel)) mask[i] = true;
    });
  });
  return mask;
};

export const missingRequiredAttributes = (program: ShaderProgram, available: readonly string[]): string[] => {
  const present = new Set(available);
  return program.vertexAttributes.filter((name) => !present.has(name));
};
