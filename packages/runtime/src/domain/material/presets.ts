import type { MatlEntry } from '@ssbh-check/contracts/types/internal';
import { defaultBlendState, defaultRasterizerState, defaultSampler, defaultTexture } from '../params/defaults';
import { parseMatlData } from './parse';
import defaultPresetsDocument from './defaultPresets.json';

export const NEW_MATERIAL_LABEL = 'NEW_MATERIAL';
export const NEW_MATERIAL_SHADER = 'SFX_PBS_0100000008008269_opaque';

const cloneEntry = (entry: MatlEntry): MatlEntry => structuredClone(entry);

export const defaultPresets = (): MatlEntry[] => {
  const parsed = parseMatlData(defaultPresetsDocument);
  return parsed.ok ? parsed.data.entries : [];
};

/**
 * Replaces an entry's parameters with a preset's. Texture paths are mesh
 * specific, so paths for slots the preset shares with the entry are kept and
 * the rest fall back to placeholder textures. The material label is kept so
 * model and animation bindings stay valid.
 */
export const applyPreset = (entry: MatlEntry, preset: MatlEntry): MatlEntry => {
  const result = cloneEntry(preset);
  result.materialLabel = entry.materialLabel;
  result.textures = preset.textures.map((presetTexture) => ({
    paramId: presetTexture.paramId,
    data:
      entry.textures.find((texture) => texture.paramId === presetTexture.paramId)?.data ??
      defaultTexture(presetTexture.paramId)
  }));
  return result;
};

export const defaultMaterial = (): MatlEntry => ({
  materialLabel: NEW_MATERIAL_LABEL,
  shaderLabel: NEW_MATERIAL_SHADER,
  booleans: [
    { paramId: 'CustomBoolean1', data: true },
    { paramId: 'CustomBoolean3', data: true },
    { paramId: 'CustomBoolean4', data: true }
  ],
  floats: [{ paramId: 'CustomFloat8', data: 0.4 }],
  vectors: [
    // All zeros leaves room for transparency.
    { paramId: 'CustomVector0', data: [0, 0, 0, 0] },
    { paramId: 'CustomVector8', data: [1, 1, 1, 1] },
    { paramId: 'CustomVector13', data: [1, 1, 1, 1] },
    { paramId: 'CustomVector14', data: [1, 1, 1, 1] }
  ],
  textures: ['Texture0', 'Texture4', 'Texture6', 'Texture7'].map((paramId) => ({
    paramId,
    data: defaultTexture(paramId)
  })),
  samplers: ['Sampler0', 'Sampler4', 'Sampler6', 'Sampler7'].map((paramId) => ({ paramId, data: defaultSampler() })),
  blendStates: [{ paramId: 'BlendState0', data: defaultBlendState() }],
  rasterizerStates: [{ paramId: 'RasterizerState0', data: defaultRasterizerState() }]
});
