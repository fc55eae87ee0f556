import {
  context,
  trace,
  SpanStatusCode,
  type Attributes,
  type AttributeValue,
  type Span,
  type Tracer,
} from '@opentelemetry/api';

/**
 * Telemetry attribute values: primitive scalars or homogeneous arrays of scalars.
 */
export type TelemetryAttributeValue =
  | string
  | number
  | boolean
  | readonly string[]
  | readonly number[]
  | readonly boolean[];

export type TelemetryAttributes = Readonly<Record<string, TelemetryAttributeValue>>;

export interface TelemetrySpanOptions {
  readonly attributes?: TelemetryAttributes;
}

export type TelemetrySpanStatus = 'ok' | 'error';

export interface TelemetrySpanEndOptions {
  readonly attributes?: TelemetryAttributes;
  readonly status?: TelemetrySpanStatus;
}

/**
 * Span handle exposed to instrumentation callers.
 */
export interface TelemetrySpan {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  startChild(name: string, options?: TelemetrySpanOptions): TelemetrySpan;
  addEvent(name: string, attributes?: TelemetryAttributes): void;
  setAttribute(name: string, value: TelemetryAttributeValue): void;
  end(options?: TelemetrySpanEndOptions): void;
}

export interface TelemetryTracer {
  startSpan(name: string, options?: TelemetrySpanOptions): TelemetrySpan;
}

export interface TelemetryTracerOptions {
  readonly instrumentation?: {
    readonly name: string;
    readonly version?: string;
  };
  readonly tracer?: Tracer;
}

const DEFAULT_INSTRUMENTATION = 'partkit.core.telemetry';

/**
 * Creates a tracer backed by OpenTelemetry, using the global provider unless a tracer is given.
 *
 * @param options - Instrumentation metadata or an explicit tracer.
 * @returns Tracer implementation backed by OpenTelemetry.
 */
export function createTelemetryTracer(options: TelemetryTracerOptions = {}): TelemetryTracer {
  const tracer =
    options.tracer ??
    trace.getTracer(
      options.instrumentation?.name ?? DEFAULT_INSTRUMENTATION,
      options.instrumentation?.version,
    );

  return {
    startSpan(name, spanOptions) {
      const span = tracer.startSpan(name, toSpanOptions(spanOptions));
      return new OpenTelemetrySpan(tracer, span, name);
    },
  };
}

export const noopTelemetryTracer: TelemetryTracer = {
  startSpan(name: string): TelemetrySpan {
    return new NoopTelemetrySpan(name);
  },
};

class OpenTelemetrySpan implements TelemetrySpan {
  constructor(
    private readonly tracer: Tracer,
    private readonly span: Span,
    readonly name: string,
  ) {}

  get spanId(): string {
    return this.span.spanContext().spanId;
  }

  get traceId(): string {
    return this.span.spanContext().traceId;
  }

  startChild(name: string, options?: TelemetrySpanOptions): TelemetrySpan {
    const parentContext = trace.setSpan(context.active(), this.span);
    const child = this.tracer.startSpan(name, toSpanOptions(options), parentContext);
    return new OpenTelemetrySpan(this.tracer, child, name);
  }

  addEvent(name: string, attributes?: TelemetryAttributes): void {
    this.span.addEvent(name, attributes ? toAttributes(attributes) : undefined);
  }

  setAttribute(name: string, value: TelemetryAttributeValue): void {
    this.span.setAttribute(name, toAttributeValue(value));
  }

  end(options?: TelemetrySpanEndOptions): void {
    if (options?.attributes) {
      this.span.setAttributes(toAttributes(options.attributes));
    }
    if (options?.status) {
      this.span.setStatus({
        code: options.status === 'error' ? SpanStatusCode.ERROR : SpanStatusCode.OK,
      });
    }
    this.span.end();
  }
}

function toSpanOptions(options: TelemetrySpanOptions | undefined): { attributes?: Attributes } {
  return options?.attributes ? { attributes: toAttributes(options.attributes) } : {};
}

function toAttributes(attributes: TelemetryAttributes): Attributes {
  const record: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    record[key] = toAttributeValue(value);
  }
  return record;
}

function toAttributeValue(value: TelemetryAttributeValue): AttributeValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  // Copy so OpenTelemetry never holds on to a frozen caller array.
  return copyArray(value);
}

function copyArray(
  value: readonly string[] | readonly number[] | readonly boolean[],
): AttributeValue {
  if (isStringArray(value)) {
    return [...value];
  }
  if (isNumberArray(value)) {
    return [...value];
  }
  return value.map(Boolean);
}

function isStringArray(value: readonly unknown[]): value is readonly string[] {
  return value.every((item) => typeof item === 'string');
}

function isNumberArray(value: readonly unknown[]): value is readonly number[] {
  return value.every((item) => typeof item === 'number');
}

class NoopTelemetrySpan implements TelemetrySpan {
  readonly spanId = 'noop-span';
  readonly traceId = 'noop-trace';

  constructor(readonly name: string) {}

  startChild(name: string): TelemetrySpan {
    return new NoopTelemetrySpan(name);
  }

  addEvent(): void {
    // noop
  }

  setAttribute(): void {
    // noop
  }

  end(): void {
    // noop
  }
}
