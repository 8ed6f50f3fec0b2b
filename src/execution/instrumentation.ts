import type {
  DocumentNode,
  ExecutionResult,
  GraphQLResolveInfo,
} from 'graphql';

/**
 * Hooks into the lifecycle of a request. Every hook is optional.
 *
 * Query, parsing and validation hooks fire from `graphql()`; execution and
 * field hooks fire from the executor. `onFieldEnd` fires once the resolver's
 * value is available, before the value is completed, or once the field
 * failed. For a subscription, `onExecutionEnd` fires when the response
 * stream finishes.
 */
export interface Instrumentation {
  onQueryStart?: () => void;
  onQueryEnd?: () => void;
  onParsingStart?: () => void;
  onParsingEnd?: () => void;
  onValidationStart?: () => void;
  onValidationEnd?: () => void;
  onExecutionStart?: () => void;
  onExecutionEnd?: () => void;
  onFieldStart?: (
    source: unknown,
    contextValue: unknown,
    info: GraphQLResolveInfo,
  ) => void;
  onFieldEnd?: (
    source: unknown,
    contextValue: unknown,
    info: GraphQLResolveInfo,
  ) => void;
  /**
   * Replaces the parsed document before it is validated and executed.
   */
  transformDocument?: (document: DocumentNode) => DocumentNode;
  /**
   * Replaces the result before it is returned.
   */
  transformResult?: (result: ExecutionResult) => ExecutionResult;
}

/**
 * Runs several instrumentations as one. Start hooks run in order, end hooks
 * in reverse order, and transforms are chained in order.
 */
export class MultiInstrumentation implements Instrumentation {
  readonly instrumentations: ReadonlyArray<Instrumentation>;

  constructor(...instrumentations: ReadonlyArray<Instrumentation>) {
    this.instrumentations = instrumentations;
  }

  onQueryStart(): void {
    for (const instrumentation of this.instrumentations) {
      instrumentation.onQueryStart?.();
    }
  }

  onQueryEnd(): void {
    for (const instrumentation of this._reversed()) {
      instrumentation.onQueryEnd?.();
    }
  }

  onParsingStart(): void {
    for (const instrumentation of this.instrumentations) {
      instrumentation.onParsingStart?.();
    }
  }

  onParsingEnd(): void {
    for (const instrumentation of this._reversed()) {
      instrumentation.onParsingEnd?.();
    }
  }

  onValidationStart(): void {
    for (const instrumentation of this.instrumentations) {
      instrumentation.onValidationStart?.();
    }
  }

  onValidationEnd(): void {
    for (const instrumentation of this._reversed()) {
      instrumentation.onValidationEnd?.();
    }
  }

  onExecutionStart(): void {
    for (const instrumentation of this.instrumentations) {
      instrumentation.onExecutionStart?.();
    }
  }

  onExecutionEnd(): void {
    for (const instrumentation of this._reversed()) {
      instrumentation.onExecutionEnd?.();
    }
  }

  onFieldStart(
    source: unknown,
    contextValue: unknown,
    info: GraphQLResolveInfo,
  ): void {
    for (const instrumentation of this.instrumentations) {
      instrumentation.onFieldStart?.(source, contextValue, info);
    }
  }

  onFieldEnd(
    source: unknown,
    contextValue: unknown,
    info: GraphQLResolveInfo,
  ): void {
    for (const instrumentation of this._reversed()) {
      instrumentation.onFieldEnd?.(source, contextValue, info);
    }
  }

  transformDocument(document: DocumentNode): DocumentNode {
    return this.instrumentations.reduce(
      (transformed, instrumentation) =>
        instrumentation.transformDocument?.(transformed) ?? transformed,
      document,
    );
  }

  transformResult(result: ExecutionResult): ExecutionResult {
    return this.instrumentations.reduce(
      (transformed, instrumentation) =>
        instrumentation.transformResult?.(transformed) ?? transformed,
      result,
    );
  }

  private _reversed(): Array<Instrumentation> {
    return [...this.instrumentations].reverse();
  }
}
