import { ValidationError } from '../errors.js';
import type { DatabaseConfigDict } from '../types.js';

/**
 * Master credentials of the shared PostgreSQL server
 */
export class DatabaseConfig {
  constructor(
    readonly name: string,
    readonly user: string,
    readonly password: string
  ) {
    for (const [field, value] of Object.entries({ name, user, password })) {
      if (value === '') {
        throw new ValidationError(`Database ${field} must not be empty`);
      }
    }
  }

  toDict(): DatabaseConfigDict {
    return {
      password: this.password,
      user: this.user,
      name: this.name,
    };
  }

  static fromDict(dict: DatabaseConfigDict): DatabaseConfig {
    return new DatabaseConfig(dict.name, dict.user, dict.password);
  }
}
