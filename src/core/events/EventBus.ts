import { Logger } from '../utils/logger';

type EventHandler<T> = (data: T) => void | Promise<void>;

type HandlerTable<Events> = { [E in keyof Events]?: Set<EventHandler<Events[E]>> };

/**
 * Typed publish/subscribe bus. Handler failures are logged, never rethrown
 * into the publisher.
 */
export class EventBus<Events extends object> {
    private handlers: HandlerTable<Events>;
    private logger: Logger | null;

    constructor(logger: Logger | null = null) {
        this.handlers = {};
        this.logger = logger;
    }

    on<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void {
        let eventHandlers = this.handlers[event];
        if (!eventHandlers) {
            eventHandlers = new Set();
            this.handlers[event] = eventHandlers;
        }
        eventHandlers.add(handler);
    }

    off<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void {
        const eventHandlers = this.handlers[event];
        if (eventHandlers) {
            eventHandlers.delete(handler);
            if (eventHandlers.size === 0) {
                delete this.handlers[event];
            }
        }
    }

    emit<E extends keyof Events>(event: E, data: Events[E]): void {
        const eventHandlers = this.handlers[event];
        if (!eventHandlers) return;

        eventHandlers.forEach(handler => {
            try {
                const result = handler(data);
                if (result instanceof Promise) {
                    result.catch(error => this.report(event, error));
                }
            } catch (error) {
                this.report(event, error);
            }
        });
    }

    clear(): void {
        this.handlers = {};
    }

    private report(event: keyof Events, error: unknown): void {
        const name = String(event);
        if (this.logger) {
            this.logger.error(`Error in event handler for ${name}`, error);
        } else {
            console.error(`Error in event handler for ${name}:`, error);
        }
    }
}
