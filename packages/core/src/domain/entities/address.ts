import { InvalidHeaderError } from '../errors';

const LINE_BREAK = /[\r\n]/;
const LIST_BREAKING = /[\r\n,<>]/;

/**
 * Email address with an optional display name.
 *
 * Renders to a single header-safe token: `"Name" <email>` or the bare email.
 */
export class Address {
  readonly email: string;
  readonly name?: string;

  constructor(email: string, name?: string) {
    if (email === '') {
      throw new InvalidHeaderError('address', 'email is required');
    }
    if (LIST_BREAKING.test(email)) {
      throw new InvalidHeaderError(
        'address',
        `email must not contain line breaks, commas or angle brackets: ${JSON.stringify(email)}`,
      );
    }
    if (name !== undefined && LINE_BREAK.test(name)) {
      throw new InvalidHeaderError(
        'address',
        `name must not contain line breaks: ${JSON.stringify(name)}`,
      );
    }
    this.email = email;
    this.name = name || undefined;
  }

  render(): string {
    if (this.name) {
      return `${quote(this.name)} <${this.email}>`;
    }
    return this.email;
  }

  toString(): string {
    return this.render();
  }
}

/**
 * Quote a header parameter or display name, escaping backslashes and quotes
 */
export function quote(value: string): string {
  return `"${value.replace(/[\\"]/g, '\\$&')}"`;
}

/**
 * Join rendered addresses for list headers (To, Cc, Bcc)
 */
export function formatAddressList(addresses: readonly Address[]): string {
  return addresses.map((address) => address.render()).join(',');
}
