import { PresetLoadError } from "@tagwarden/errors";
import presetData from "../data/presets.json" with { type: "json" };
import { PolicyBuilder } from "./builder.js";
import { applyDefinition } from "./definition/apply.js";
import {
  PRESET_NAMES,
  type PresetName,
  type PresetTable,
  PresetTableSchema,
} from "./definition/schema.js";
import type { PolicyBuilderOptions } from "./types.js";

let presetTable: PresetTable | undefined;

/** Validate the bundled table once, including its `extends` chains */
function loadPresetTable(): PresetTable {
  if (presetTable) return presetTable;

  const result = PresetTableSchema.safeParse(presetData);
  if (!result.success) {
    throw new PresetLoadError("*", result.error);
  }
  const table = result.data;

  for (const name of PRESET_NAMES) {
    const seen = new Set<PresetName>();
    let current: PresetName | undefined = name;
    while (current !== undefined) {
      if (seen.has(current)) {
        throw new PresetLoadError(name, new Error(`'extends' cycle through '${current}'`));
      }
      seen.add(current);
      current = table[current].extends;
    }
  }

  presetTable = table;
  return table;
}

/**
 * Fresh builder pre-populated with a named preset. Callers may keep
 * extending it before `build()`.
 */
export function presetBuilder(name: PresetName, options?: PolicyBuilderOptions): PolicyBuilder {
  const definition = loadPresetTable()[name];
  const builder = definition.extends
    ? presetBuilder(definition.extends, options)
    : new PolicyBuilder(options);
  return applyDefinition(builder, definition);
}

/** Only text nodes pass: every tag is stripped. */
export function nonePreset(options?: PolicyBuilderOptions): PolicyBuilder {
  return presetBuilder("none", options);
}

/** `b, em, i, strong, u` and no attributes. */
export function simpleTextPreset(options?: PolicyBuilderOptions): PolicyBuilder {
  return presetBuilder("simpleText", options);
}

/**
 * Common inline and list formatting. Links may use `ftp`, `http`, `https`
 * or `mailto` and always carry `rel="nofollow"`. No images.
 */
export function basicPreset(options?: PolicyBuilderOptions): PolicyBuilder {
  return presetBuilder("basic", options);
}

/** {@link basicPreset} plus `img` with `http`/`https` sources. */
export function basicWithImagesPreset(options?: PolicyBuilderOptions): PolicyBuilder {
  return presetBuilder("basicWithImages", options);
}

/**
 * Text, headings, images and tables. Links are not forced to
 * `rel="nofollow"`; add an enforced attribute if that is wanted.
 */
export function relaxedPreset(options?: PolicyBuilderOptions): PolicyBuilder {
  return presetBuilder("relaxed", options);
}
