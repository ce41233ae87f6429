import { MalformedResourceError } from "../errors/kademlia-errors";
import { RESOURCE_SEPARATOR } from "./protocol.constants";

/**
 * A named value stored on the overlay. Neither field may contain the
 * separator its encoding uses.
 */
export class StringResource {
  readonly name: string;
  readonly value: string;

  constructor(name: string, value: string, separator = RESOURCE_SEPARATOR) {
    if (name.includes(separator) || value.includes(separator)) {
      throw new MalformedResourceError(
        `fields of "${name}" must not contain the separator`,
      );
    }
    this.name = name;
    this.value = value;
  }

  /**
   * Decode a resource from `name SEPARATOR value`.
   * @throws MalformedResourceError if the separator is missing or repeated
   */
  static parse(text: string, separator = RESOURCE_SEPARATOR): StringResource {
    const parts = text.split(separator);
    if (parts.length !== 2) {
      throw new MalformedResourceError(
        `expected exactly one separator, found ${parts.length - 1}`,
      );
    }
    return new StringResource(parts[0], parts[1], separator);
  }

  equals(other: StringResource): boolean {
    return this.name === other.name && this.value === other.value;
  }

  toString(separator = RESOURCE_SEPARATOR): string {
    return `${this.name}${separator}${this.value}`;
  }
}
