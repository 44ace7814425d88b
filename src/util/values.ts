/**
 * Runtime value inspection helpers.
 */

/**
 * Classes are functions whose source starts with `class`.
 */
export function isClass(value: unknown): boolean {
  return typeof value === "function" && /^class[\s{]/.test(Function.prototype.toString.call(value));
}

/**
 * Name of the constructor on an object's prototype, if any.
 */
export function constructorName(value: object): string | null {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) return null;
  const ctor: unknown = Reflect.get(proto, "constructor");
  return typeof ctor === "function" && ctor.name ? ctor.name : null;
}

/**
 * Short human-readable description of a runtime value.
 */
export function describeValue(value: unknown): string {
  switch (typeof value) {
    case "function":
      return isClass(value) ? `[class ${value.name || "<anonymous>"}]` : `[function ${value.name || "<anonymous>"}]`;
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value}n`;
    case "symbol":
      return value.toString();
    case "object": {
      if (value === null) return "null";
      if (Array.isArray(value)) return `[array(${value.length})]`;
      const name = constructorName(value);
      return name && name !== "Object" ? `[object ${name}]` : "[object]";
    }
    default:
      return String(value);
  }
}
