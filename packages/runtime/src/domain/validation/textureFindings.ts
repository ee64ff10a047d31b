import type {
  FileSlot,
  MatlData,
  MatlDiagnostic,
  NutexbDiagnostic,
  NutexbFile,
  TextureParam
} from '@ssbh-check/contracts/types/internal';
import { expectsSrgb } from '../params/classify';
import { expectedTextureDimension, isSrgb, nutexbDimension } from '../texture/formats';
import { textureNameMatches } from '../texture/names';
import type { ValidationMessages } from './types';

type TextureArgs = {
  matl: MatlData;
  nutexbs: readonly FileSlot<NutexbFile>[];
  messages: ValidationMessages;
};

type ResolvedTexture = { name: string; nutexb: NutexbFile };

// Only the first file with a matching name is considered, even if it failed to parse.
const resolveTexture = (nutexbs: readonly FileSlot<NutexbFile>[], texture: TextureParam): ResolvedTexture | null => {
  const slot = nutexbs.find((candidate) => textureNameMatches(candidate.name, texture.data));
  return slot && slot.file.ok ? { name: slot.name, nutexb: slot.file.data } : null;
};

/** sRGB textures assigned to linear slots and the reverse. */
export const collectTextureFormatFindings = (
  args: TextureArgs
): { matl: MatlDiagnostic[]; nutexb: NutexbDiagnostic[] } => {
  const matl: MatlDiagnostic[] = [];
  const nutexb: NutexbDiagnostic[] = [];

  args.matl.entries.forEach((entry, entryIndex) => {
    entry.textures.forEach((texture) => {
      const resolved = resolveTexture(args.nutexbs, texture);
      if (!resolved) return;
      const format = resolved.nutexb.footer.imageFormat;
      const expected = expectsSrgb(texture.paramId);
      if (expected === isSrgb(format)) return;
      matl.push({
        code: 'unexpected_texture_format',
        entryIndex,
        materialLabel: entry.materialLabel,
        param: texture.paramId,
        nutexb: resolved.name,
        format,
        message: args.messages.unexpectedTextureFormat(
          resolved.name,
          entry.materialLabel,
          format,
          texture.paramId,
          expected
        )
      });
      nutexb.push({
        code: 'format_invalid_for_usage',
        nutexb: resolved.name,
        format,
        param: texture.paramId,
        message: args.messages.textureFormatInvalidForUsage(resolved.name, format, texture.paramId, expected)
      });
    });
  });

  return { matl, nutexb };
};

/**
 * Cube map slots given 2D textures and the reverse. Only reported on the
 * material since the fix is assigning a different texture.
 */
export const collectTextureDimensionFindings = (args: TextureArgs): MatlDiagnostic[] => {
  const findings: MatlDiagnostic[] = [];
  args.matl.entries.forEach((entry, entryIndex) => {
    entry.textures.forEach((texture) => {
      const resolved = resolveTexture(args.nutexbs, texture);
      if (!resolved) return;
      const expected = expectedTextureDimension(texture.paramId);
      const actual = nutexbDimension(resolved.nutexb);
      if (expected === actual) return;
      findings.push({
        code: 'unexpected_texture_dimension',
        entryIndex,
        materialLabel: entry.materialLabel,
        param: texture.paramId,
        nutexb: resolved.name,
        expected,
        actual,
        message: args.messages.unexpectedTextureDimension(
          resolved.name,
          entry.materialLabel,
          texture.paramId,
          expected,
          actual
        )
      });
    });
  });
  return findings;
};

/** Texture paths that name neither a file in the folder nor a renderer default. */
export const collectTextureAssignmentFindings = (
  args: TextureArgs & { defaultTextureNames: readonly string[] }
): MatlDiagnostic[] => {
  const findings: MatlDiagnostic[] = [];
  const candidates = [...args.nutexbs.map((slot) => slot.name), ...args.defaultTextureNames];
  args.matl.entries.forEach((entry, entryIndex) => {
    entry.textures.forEach((texture) => {
      if (candidates.some((name) => textureNameMatches(name, texture.data))) return;
      findings.push({
        code: 'missing_texture',
        entryIndex,
        materialLabel: entry.materialLabel,
        param: texture.paramId,
        nutexb: texture.data,
        message: args.messages.missingTexture(texture.data, texture.paramId, entry.materialLabel)
      });
    });
  });
  return findings;
};
