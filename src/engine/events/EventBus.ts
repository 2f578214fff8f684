/**
 * =============================================================================
 * EVENT-BUS.TS - Pub/sub sincrono, tipizzato sul catalogo degli eventi
 * =============================================================================
 * emit() consegna subito, nello stesso tick di chi emette. Un listener che
 * lancia viene loggato e non ferma gli altri.
 */

export type EventCallback<T> = (data: T) => void;

type ListenerTable<E> = { [K in keyof E]?: Set<EventCallback<E[K]>> };

/** Catene di emit annidate oltre questa profondità vengono troncate */
const MAX_NESTED_EMITS = 10;

export class EventBus<E extends object> {
    private _listeners: ListenerTable<E>;
    private _depth: number;

    constructor() {
        this._listeners = {};
        this._depth = 0;
    }

    /**
     * @returns la funzione che stacca il listener
     */
    on<K extends keyof E>(eventType: K, callback: EventCallback<E[K]>): () => void {
        const listeners = this._listeners[eventType] ?? new Set<EventCallback<E[K]>>();
        listeners.add(callback);
        this._listeners[eventType] = listeners;

        return () => {
            this.off(eventType, callback);
        };
    }

    off<K extends keyof E>(eventType: K, callback: EventCallback<E[K]>): boolean {
        return this._listeners[eventType]?.delete(callback) ?? false;
    }

    emit<K extends keyof E>(eventType: K, data: E[K]): void {
        const listeners = this._listeners[eventType];
        if (!listeners || listeners.size === 0) {
            return;
        }

        if (this._depth >= MAX_NESTED_EMITS) {
            console.error(`[EventBus] "${String(eventType)}" scartato: ${this._depth} emit annidati`);
            return;
        }

        this._depth++;
        try {
            // Snapshot: un listener può staccarsi durante la consegna
            for (const callback of [...listeners]) {
                try {
                    callback(data);
                } catch (error) {
                    console.error(`[EventBus] Listener di "${String(eventType)}" fallito:`, error);
                }
            }
        } finally {
            this._depth--;
        }
    }

    listenerCount(eventType: keyof E): number {
        return this._listeners[eventType]?.size ?? 0;
    }

    clear(): void {
        this._listeners = {};
    }
}

export default EventBus;
