/**
 * Validated identifiers. Only a SchemaInstance hands these out, so holding one
 * means the name was checked against the table schema.
 */

export class TableRef {
  private readonly tokenKind = 'table';

  constructor(readonly name: string) {}

  toString(): string {
    return `${this.tokenKind}:${this.name}`;
  }
}

export class FieldRef {
  private readonly tokenKind = 'field';

  constructor(readonly name: string) {}

  toString(): string {
    return `${this.tokenKind}:${this.name}`;
  }
}

export class ParamRef {
  private readonly tokenKind = 'param';

  constructor(readonly name: string) {}

  toString(): string {
    return `${this.tokenKind}:${this.name}`;
  }
}

export type Operand = FieldRef | ParamRef;
