/**
 * Statement Builder
 *
 * Base for every builder. Holds the statement tree and a single error slot.
 * Chain methods resolve names against the table schema as they are called;
 * the first failure is stored and every later chain call becomes a no-op.
 * Only render(), mustRender() and exec*() report it.
 */

import { KeyqlError } from '../errors';

import type { QueryContext } from './query-context';
import type { AstBuilder } from '../ast';
import type { RenderedQuery } from '../dialect/sql-dialect';
import type { SchemaInstance } from '../schema';

export type RenderOutcome = { ok: true; query: RenderedQuery } | { ok: false; error: KeyqlError };

export abstract class StatementBuilder {
  protected error?: KeyqlError;

  protected constructor(
    protected readonly ctx: QueryContext,
    protected ast: AstBuilder,
  ) {}

  // ============ Rendering ============

  /**
   * Render to SQL with named placeholders, or report the stored error.
   */
  render(): RenderOutcome {
    if (this.error) {
      return { ok: false, error: this.error };
    }
    try {
      return { ok: true, query: this.renderQuery() };
    } catch (error) {
      if (error instanceof KeyqlError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * Render or throw
   */
  mustRender(): RenderedQuery {
    const outcome = this.render();
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.query;
  }

  instance(): SchemaInstance {
    return this.ctx.schema;
  }

  protected renderQuery(): RenderedQuery {
    return this.ctx.dialect.render(this.ast.build());
  }

  /**
   * Stored error, then safety checks. Run first by every exec*().
   */
  protected checkReady(): void {
    if (this.error) {
      throw this.error;
    }
    this.assertExecutable();
  }

  /**
   * checkReady(), then render
   */
  protected prepare(): RenderedQuery {
    this.checkReady();
    return this.renderQuery();
  }

  /**
   * Checks run before rendering for execution
   */
  protected assertExecutable(): void {}

  /**
   * Run a chain step. Does nothing once an error is stored; a validation
   * failure inside the step is stored instead of thrown.
   */
  protected apply(step: () => void): this {
    if (this.error) {
      return this;
    }
    try {
      step();
    } catch (error) {
      if (!(error instanceof KeyqlError)) {
        throw error;
      }
      this.error = error;
    }
    return this;
  }

  protected fail(error: KeyqlError): this {
    this.error ??= error;
    return this;
  }
}
