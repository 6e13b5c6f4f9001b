/** A valid Json value */
export type Value = number | string | boolean | null | { [x: string]: Value } | Array<Value>;

/** serializing an object to Json */
export interface Serializable<J extends Value = Value> {
  toJson(): J;
}
