import type {
  BLEND_FACTORS,
  CULL_MODES,
  FILL_MODES,
  MAG_FILTERS,
  MAX_ANISOTROPY,
  MIN_FILTERS,
  PARAM_KINDS,
  WRAP_MODES
} from '../schema/constants';

/**
 * Name of a material parameter slot, e.g. `CustomVector0` or `Texture4`.
 * The numeric encoding used for ordering is owned by the runtime param table.
 */
export type ParamId = string;

export type ParamKind = typeof PARAM_KINDS[number];

export type Vector4 = [number, number, number, number];

export type WrapMode = typeof WRAP_MODES[number];
export type MinFilter = typeof MIN_FILTERS[number];
export type MagFilter = typeof MAG_FILTERS[number];
export type MaxAnisotropy = typeof MAX_ANISOTROPY[number];
export type BlendFactor = typeof BLEND_FACTORS[number];
export type FillMode = typeof FILL_MODES[number];
export type CullMode = typeof CULL_MODES[number];

export type SamplerData = {
  wraps: WrapMode;
  wrapt: WrapMode;
  wrapr: WrapMode;
  minFilter: MinFilter;
  magFilter: MagFilter;
  borderColor: Vector4;
  lodBias: number;
  maxAnisotropy: MaxAnisotropy | null;
};

export type BlendStateData = {
  sourceColor: BlendFactor;
  destinationColor: BlendFactor;
  alphaSampleToCoverage: boolean;
};

export type RasterizerStateData = {
  fillMode: FillMode;
  cullMode: CullMode;
  depthBias: number;
};

export type Param<T> = {
  paramId: ParamId;
  data: T;
};

export type BooleanParam = Param<boolean>;
export type FloatParam = Param<number>;
export type Vector4Param = Param<Vector4>;
export type TextureParam = Param<string>;
export type SamplerParam = Param<SamplerData>;
export type BlendStateParam = Param<BlendStateData>;
export type RasterizerStateParam = Param<RasterizerStateData>;

export interface MatlEntry {
  materialLabel: string;
  shaderLabel: string;
  booleans: BooleanParam[];
  floats: FloatParam[];
  vectors: Vector4Param[];
  textures: TextureParam[];
  samplers: SamplerParam[];
  blendStates: BlendStateParam[];
  rasterizerStates: RasterizerStateParam[];
}

export interface MatlData {
  majorVersion: number;
  minorVersion: number;
  entries: MatlEntry[];
}
