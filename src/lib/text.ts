const invisibleChars = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f\u200b-\u200d\ufeff]/g;
const versionSuffix = /\s+(R\d+|v\d+|\d{4})(\.\d+)*$/i;

export function stripInvisible(value: string): string {
  return value.replace(invisibleChars, "");
}

export function toSnakeCase(header: string): string {
  let name = stripInvisible(header).trim();
  if (name === "#") {
    return "index";
  }
  if (name.endsWith(" #")) {
    name = `${name.slice(0, -2)}_id`;
  }
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** Sheet name reduced to the key used for entity-type resolution ("SCF 2025.3.1" -> "scf"). */
export function sheetKey(sheetName: string): string {
  const withoutVersion = stripInvisible(sheetName).trim().replace(versionSuffix, "").trim();
  return toSnakeCase(withoutVersion);
}
