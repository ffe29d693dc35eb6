import { Type } from "./definitions.js";

export const HANDLE_TYPE_NAMES = [
  "unit",
  "unitgroup",
  "unitfilter",
  "unitref",
  "point",
  "region",
  "trigger",
  "timer",
  "actor",
  "actorscope",
  "wave",
  "wavetarget",
  "waveinfo",
  "sound",
  "soundlink",
  "revealer",
  "playergroup",
  "shuffler",
  "color",
  "abilcmd",
  "order",
  "marker",
  "bank",
  "camerainfo",
  "aifilter",
  "effecthistory",
  "bitmask",
  "datetime",
  "doodad",
  "generichandle",
  "transmissionsource",
] as const;

export type HandleTypeName = (typeof HANDLE_TYPE_NAMES)[number];

export const HANDLE_TYPES: ReadonlyMap<string, Type.Handle> = new Map(
  HANDLE_TYPE_NAMES.map((name) => [name, new Type.Handle(name)] as const),
);

/**
 * Every type name known before user code is read, including the
 * `integer`, `boolean` and `byte` aliases
 */
export const BUILTIN_TYPES: ReadonlyMap<string, Type> = new Map<string, Type>([
  ["void", Type.Basic.void_],
  ["int", Type.Basic.int],
  ["integer", Type.Basic.int],
  ["byte", Type.Basic.int],
  ["fixed", Type.Basic.fixed],
  ["bool", Type.Basic.bool],
  ["boolean", Type.Basic.bool],
  ["string", Type.Basic.string],
  ["text", Type.Basic.text],
  ...HANDLE_TYPES,
]);

export const isBuiltinTypeName = (name: string): boolean =>
  BUILTIN_TYPES.has(name);
