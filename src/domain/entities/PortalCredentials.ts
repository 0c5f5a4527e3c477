import { inspect } from 'node:util';

const MASKED = '[credentials]';

/**
 * 入口網站帳密
 *
 * 不透明值物件：序列化、字串化或 inspect 時一律遮蔽，
 * 只能透過 username / password 明確取用。
 */
export class PortalCredentials {
  constructor(
    private readonly user: string,
    private readonly secret: string,
  ) {}

  get username(): string {
    return this.user;
  }

  get password(): string {
    return this.secret;
  }

  toString(): string {
    return MASKED;
  }

  toJSON(): string {
    return MASKED;
  }

  [inspect.custom](): string {
    return MASKED;
  }
}
