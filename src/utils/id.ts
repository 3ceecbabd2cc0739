import { ValidationError } from "../errors";

const ID_SEPARATOR = "/";

/**
 * Build a composite id: "<owner>/<name>"
 */
export function getIdFromOwnerAndName(owner: string, name: string): string {
  return `${owner}${ID_SEPARATOR}${name}`;
}

/**
 * Split a composite id into owner and name.
 * Throws ValidationError unless the id has exactly two non-empty parts.
 */
export function getOwnerAndNameFromId(id: string): {
  owner: string;
  name: string;
} {
  const tokens = id.split(ID_SEPARATOR);
  if (tokens.length !== 2 || tokens[0] === "" || tokens[1] === "") {
    throw new ValidationError(`Invalid id: ${id}`, {
      expected: "<owner>/<name>",
    });
  }

  const [owner, name] = tokens;
  return { owner, name };
}
