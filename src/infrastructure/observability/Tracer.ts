/**
 * Tracer - Tracing interface and implementation.
 *
 * One trace per optimization cycle; agent proposals, arbitration and
 * execution are child spans of the cycle span.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { IdGenerator } from '../../shared/utils/IdGenerator.js';

export interface SpanContext {
    traceId: string;
    spanId: string;
    parentSpanId?: string;
}

/** 'unset' until the span's work settles */
export type SpanStatus = 'unset' | 'ok' | 'error';

export interface SpanAttributes {
    [key: string]: string | number | boolean | undefined;
}

export interface SpanEvent {
    name: string;
    timestamp: Date;
    attributes?: SpanAttributes;
}

export interface ISpan {
    readonly context: SpanContext;
    readonly name: string;
    readonly startTime: Date;

    setStatus(status: SpanStatus): void;
    setAttributes(attributes: SpanAttributes): void;
    addEvent(name: string, attributes?: SpanAttributes): void;
    end(): void;

    isEnded(): boolean;
    getDuration(): number | null;
}

export interface ITracer {
    startSpan(name: string, parentContext?: SpanContext): ISpan;

    /**
     * Run a function within a new span, nested under the span active in the
     * calling async context. The span is ended when the function settles.
     */
    withSpan<T>(name: string, fn: (span: ISpan) => Promise<T>): Promise<T>;

    getTraces(): TraceData[];
}

export interface TraceData {
    traceId: string;
    spans: SpanData[];
}

export interface SpanData {
    context: SpanContext;
    name: string;
    startTime: Date;
    endTime?: Date;
    duration?: number;
    status: SpanStatus;
    attributes: SpanAttributes;
    events: SpanEvent[];
}

class SimpleSpan implements ISpan {
    readonly startTime = new Date();

    private endTime?: Date;
    private status: SpanStatus = 'unset';
    private attributes: SpanAttributes = {};
    private events: SpanEvent[] = [];

    constructor(readonly name: string, readonly context: SpanContext) {}

    setStatus(status: SpanStatus): void {
        if (!this.isEnded()) {
            this.status = status;
        }
    }

    setAttributes(attributes: SpanAttributes): void {
        if (!this.isEnded()) {
            this.attributes = { ...this.attributes, ...attributes };
        }
    }

    addEvent(name: string, attributes?: SpanAttributes): void {
        if (!this.isEnded()) {
            this.events.push({ name, timestamp: new Date(), attributes });
        }
    }

    end(): void {
        if (!this.isEnded()) {
            this.endTime = new Date();
        }
    }

    isEnded(): boolean {
        return this.endTime !== undefined;
    }

    getDuration(): number | null {
        if (!this.endTime) return null;
        return this.endTime.getTime() - this.startTime.getTime();
    }

    toData(): SpanData {
        return {
            context: { ...this.context },
            name: this.name,
            startTime: this.startTime,
            endTime: this.endTime,
            duration: this.getDuration() ?? undefined,
            status: this.status,
            attributes: { ...this.attributes },
            events: [...this.events],
        };
    }
}

/**
 * In-memory tracer keeping the most recent traces.
 *
 * The active span is tracked per async context, so agents proposing
 * concurrently each nest under the cycle span rather than under each other.
 */
export class SimpleTracer implements ITracer {
    private traces: Map<string, SimpleSpan[]> = new Map();
    private active = new AsyncLocalStorage<SimpleSpan>();

    constructor(private readonly maxTraces: number = 100) {}

    startSpan(name: string, parentContext?: SpanContext): ISpan {
        return this.createSpan(name, parentContext);
    }

    async withSpan<T>(name: string, fn: (span: ISpan) => Promise<T>): Promise<T> {
        const span = this.createSpan(name, this.active.getStore()?.context);

        try {
            const result = await this.active.run(span, () => fn(span));
            span.setStatus('ok');
            return result;
        } catch (error) {
            span.setStatus('error');
            if (error instanceof Error) {
                span.setAttributes({ 'error.name': error.name, 'error.message': error.message });
            }
            throw error;
        } finally {
            span.end();
        }
    }

    getTraces(): TraceData[] {
        return [...this.traces].map(([traceId, spans]) => ({
            traceId,
            spans: spans.map(s => s.toData()),
        }));
    }

    getTrace(traceId: string): TraceData | undefined {
        const spans = this.traces.get(traceId);
        if (!spans) return undefined;
        return { traceId, spans: spans.map(s => s.toData()) };
    }

    clear(): void {
        this.traces.clear();
    }

    private createSpan(name: string, parentContext?: SpanContext): SimpleSpan {
        const traceId = parentContext?.traceId ?? IdGenerator.generate();
        const span = new SimpleSpan(name, {
            traceId,
            spanId: IdGenerator.generate(),
            parentSpanId: parentContext?.spanId,
        });

        const traceSpans = this.traces.get(traceId) ?? [];
        traceSpans.push(span);
        this.traces.set(traceId, traceSpans);

        if (this.traces.size > this.maxTraces) {
            const oldestKey = this.traces.keys().next().value;
            if (oldestKey !== undefined) {
                this.traces.delete(oldestKey);
            }
        }

        return span;
    }
}

/**
 * No-op tracer for when tracing is disabled.
 */
export class NullTracer implements ITracer {
    private nullSpan: ISpan = {
        context: { traceId: '', spanId: '' },
        name: '',
        startTime: new Date(),
        setStatus: () => {},
        setAttributes: () => {},
        addEvent: () => {},
        end: () => {},
        isEnded: () => true,
        getDuration: () => null,
    };

    startSpan(_name: string, _parentContext?: SpanContext): ISpan {
        return this.nullSpan;
    }

    async withSpan<T>(_name: string, fn: (span: ISpan) => Promise<T>): Promise<T> {
        return fn(this.nullSpan);
    }

    getTraces(): TraceData[] {
        return [];
    }
}
