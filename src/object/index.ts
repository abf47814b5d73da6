/**
 * Object module exports.
 */

export {
  ObjectType,
  DECLINED,
  BaseObject,
  VelaNil,
  VelaBool,
  VelaNumber,
  VelaString,
  VelaPath,
  VelaTag,
  VelaArray,
  VelaEnum,
  VelaNativeEnum,
  VelaNativeObject,
  VelaFunction,
  VelaNativeFunction,
  VelaGenerator,
  VelaIterator,
  VelaNativeIterator,
  NIL,
  TRUE,
  FALSE,
  toBool,
  valuesEqual,
} from "./object.js";
export type {
  VelaObject,
  OpResult,
  CallContext,
  NativeFn,
  SavedFrame,
  TagType,
} from "./object.js";
