/**
 * CASE expression builder, opened by selectCase() and closed by end(),
 * which hands the expression (or the first error) back to the select chain.
 *
 * @example
 * ```typescript
 * users.query()
 *   .fields('id')
 *   .selectCase()
 *   .when('age', '<', 'adult_age', 'minor_label')
 *   .whenNull('age', 'unknown_label')
 *   .else('adult_label')
 *   .as('age_group')
 *   .end();
 * ```
 */

import { ConditionError, KeyqlError } from '../errors';
import { C, NotNull, Null, resolveCondition } from './condition';

import type { Condition } from './condition';
import type { CaseWhen, ParamRef, SelectExpression } from '../ast';
import type { SchemaInstance } from '../schema';

export type ExpressionOutcome = { expression: SelectExpression } | { error: KeyqlError };

export class CaseBuilder<P> {
  private readonly whens: CaseWhen[] = [];
  private otherwise?: ParamRef;
  private alias = '';
  private error?: KeyqlError;

  constructor(
    private readonly schema: SchemaInstance,
    private readonly finish: (outcome: ExpressionOutcome) => P,
  ) {}

  /**
   * WHEN field <operator> :param THEN :result
   */
  when(field: string, operator: string, param: string, resultParam: string): this {
    return this.addWhen(C(field, operator, param), resultParam);
  }

  whenNull(field: string, resultParam: string): this {
    return this.addWhen(Null(field), resultParam);
  }

  whenNotNull(field: string, resultParam: string): this {
    return this.addWhen(NotNull(field), resultParam);
  }

  else(resultParam: string): this {
    return this.step(() => {
      this.otherwise = this.schema.tryParam(resultParam);
    });
  }

  as(alias: string): this {
    return this.step(() => {
      this.alias = this.schema.tryAlias(alias);
    });
  }

  /**
   * Add the expression to the select list and return to it
   */
  end(): P {
    if (this.error) {
      return this.finish({ error: this.error });
    }
    if (this.whens.length === 0) {
      return this.finish({ error: new ConditionError('CASE expression requires at least one WHEN clause') });
    }
    return this.finish({
      expression: { kind: 'case', whens: [...this.whens], otherwise: this.otherwise, alias: this.alias },
    });
  }

  private addWhen(condition: Condition, resultParam: string): this {
    return this.step(() => {
      const resolved = resolveCondition(this.schema, condition);
      this.whens.push({ condition: resolved, result: this.schema.tryParam(resultParam) });
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
