/**
 * Window function builder: FUNC(args) OVER (PARTITION BY ... ORDER BY ... ROWS BETWEEN ...).
 *
 * @example
 * ```typescript
 * orders.query()
 *   .fields('id', 'customer_id')
 *   .selectSumOver('total')
 *   .partitionBy('customer_id')
 *   .orderBy('created_at', 'asc')
 *   .frame('UNBOUNDED PRECEDING', 'CURRENT ROW')
 *   .as('running_total')
 *   .end();
 * ```
 */

import { KeyqlError } from '../errors';
import { resolveDirection, resolveFrameBound } from './operators';

import type { ExpressionOutcome } from './case-builder';
import type { FieldRef, Operand, OrderItem, WindowFrame, WindowFunction } from '../ast';
import type { SchemaInstance } from '../schema';

export class WindowBuilder<P> {
  private args: Operand[] = [];
  private readonly partitions: FieldRef[] = [];
  private readonly ordering: OrderItem[] = [];
  private window?: WindowFrame;
  private alias = '';
  private error?: KeyqlError;

  /**
   * `resolveArgs` runs immediately; its failure is held until end().
   */
  constructor(
    private readonly schema: SchemaInstance,
    private readonly func: WindowFunction,
    resolveArgs: () => Operand[],
    private readonly finish: (outcome: ExpressionOutcome) => P,
  ) {
    this.step(() => {
      this.args = resolveArgs();
    });
  }

  partitionBy(...fields: string[]): this {
    return this.step(() => {
      this.partitions.push(...fields.map((field) => this.schema.tryField(field)));
    });
  }

  orderBy(field: string, direction: string): this {
    return this.step(() => {
      const resolvedDirection = resolveDirection(direction);
      this.ordering.push({ kind: 'field', field: this.schema.tryField(field), direction: resolvedDirection });
    });
  }

  /**
   * ROWS BETWEEN start AND end
   */
  frame(start: string, end: string): this {
    return this.step(() => {
      this.window = { start: resolveFrameBound(start), end: resolveFrameBound(end) };
    });
  }

  as(alias: string): this {
    return this.step(() => {
      this.alias = this.schema.tryAlias(alias);
    });
  }

  end(): P {
    if (this.error) {
      return this.finish({ error: this.error });
    }
    return this.finish({
      expression: {
        kind: 'window',
        func: this.func,
        args: this.args,
        partitionBy: [...this.partitions],
        orderBy: [...this.ordering],
        frame: this.window,
        alias: this.alias,
      },
    });
  }

  private step(fn: () => void): this {
    if (this.error) {
      return this;
    }
    try {
      fn();
    } catch (error) {
      if (!(error instanceof KeyqlError)) {
        throw error;
      }
      this.error = error;
    }
    return this;
  }
}
