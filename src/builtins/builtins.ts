/**
 * Built-in functions for Vela.
 */

import {
  VelaObject,
  VelaArray,
  VelaNativeFunction,
  VelaNativeIterator,
  VelaNumber,
  VelaString,
} from "../object/object.js";
import { VMError } from "../vm/errors.js";

/**
 * Create the standard builtins map.
 */
export function createBuiltins(): Map<string, VelaObject> {
  const builtins = new Map<string, VelaObject>();

  // len - length of a string or array
  builtins.set(
    "len",
    new VelaNativeFunction("len", 1, ([value]) => {
      if (value instanceof VelaString) {
        return new VelaNumber(value.value.length);
      }
      if (value instanceof VelaArray) {
        return new VelaNumber(value.elements.length);
      }
      throw new VMError(`len() not supported for '${value.type}'`);
    })
  );

  // type - name of a value's kind
  builtins.set(
    "type",
    new VelaNativeFunction("type", 1, ([value]) => new VelaString(value.type))
  );

  // string - printed form of a value
  builtins.set(
    "string",
    new VelaNativeFunction("string", 1, ([value]) => new VelaString(String(value)))
  );

  // range - integers from start up to (not including) stop
  builtins.set(
    "range",
    new VelaNativeFunction("range", 2, ([start, stop]) => {
      if (!(start instanceof VelaNumber) || !(stop instanceof VelaNumber)) {
        throw new VMError("range() takes two numbers");
      }
      return new VelaNativeIterator(countUp(start.value, stop.value));
    })
  );

  // append - add a value to the end of an array, in place
  builtins.set(
    "append",
    new VelaNativeFunction("append", 2, ([array, value]) => {
      if (!(array instanceof VelaArray)) {
        throw new VMError(`append() needs an array, got '${array.type}'`);
      }
      array.elements.push(value);
      return array;
    })
  );

  // clock - seconds since the epoch
  builtins.set(
    "clock",
    new VelaNativeFunction("clock", 0, () => new VelaNumber(Date.now() / 1000))
  );

  return builtins;
}

function* countUp(start: number, stop: number): Generator<VelaObject> {
  for (let i = start; i < stop; i++) {
    yield new VelaNumber(i);
  }
}
