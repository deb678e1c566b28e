import type { OdooConfigDict } from '../types.js';

/**
 * One Odoo environment as recorded in setup.yml
 */
export class OdooConfig {
  constructor(
    readonly name: string,
    readonly dbPassword: string
  ) {}

  toDict(): OdooConfigDict {
    return {
      name: this.name,
      db_password: this.dbPassword,
    };
  }

  static fromDict(dict: OdooConfigDict): OdooConfig {
    return new OdooConfig(dict.name, dict.db_password);
  }
}
