import type { GamePhase } from './state';
import type { Vector2 } from 'types';
import { rootLogger, type Logger } from 'util/log';

export type SessionQuitReason = 'quit-event' | 'keypress';

export interface ItemSpawnedPayload {
    readonly itemId: number;
    readonly x: number;
    readonly speed: number;
}

export interface ItemCaughtPayload {
    readonly itemId: number;
    readonly score: number;
}

export interface ItemMissedPayload {
    readonly itemId: number;
    readonly position: Vector2;
}

export interface ReactionTriggeredPayload {
    readonly itemId: number;
    readonly expiresAt: number;
}

export interface PhaseChangedPayload {
    readonly from: GamePhase;
    readonly to: GamePhase;
    readonly score: number;
}

export interface SessionQuitPayload {
    readonly phase: GamePhase;
    readonly score: number;
    readonly reason: SessionQuitReason;
}

export interface CatcherEventMap {
    readonly ItemSpawned: ItemSpawnedPayload;
    readonly ItemCaught: ItemCaughtPayload;
    readonly ItemMissed: ItemMissedPayload;
    readonly ReactionTriggered: ReactionTriggeredPayload;
    readonly PhaseChanged: PhaseChangedPayload;
    readonly SessionQuit: SessionQuitPayload;
}

export type CatcherEventName = keyof CatcherEventMap;

export interface EventEnvelope<EventName extends CatcherEventName> {
    readonly type: EventName;
    readonly timestamp: number;
    readonly payload: CatcherEventMap[EventName];
}

export type EventListener<EventName extends CatcherEventName> = (event: EventEnvelope<EventName>) => void;

export interface CatcherEventBus {
    publish<EventName extends CatcherEventName>(
        this: void,
        type: EventName,
        payload: CatcherEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends CatcherEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    subscribeOnce<EventName extends CatcherEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    unsubscribe<EventName extends CatcherEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): void;
    clear(this: void): void;
    listenerCount(this: void, type: CatcherEventName): number;
}

type ListenerRegistry = {
    readonly [EventName in CatcherEventName]: Set<EventListener<EventName>>;
};

const createRegistry = (): ListenerRegistry => ({
    ItemSpawned: new Set(),
    ItemCaught: new Set(),
    ItemMissed: new Set(),
    ReactionTriggered: new Set(),
    PhaseChanged: new Set(),
    SessionQuit: new Set(),
});

export interface EventBusOptions {
    readonly now?: () => number;
    readonly logger?: Logger;
}

export const createEventBus = (options: EventBusOptions = {}): CatcherEventBus => {
    const registry = createRegistry();
    const resolveNow = options.now ?? Date.now;
    const logger = (options.logger ?? rootLogger).child('events');

    const publish: CatcherEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        const listeners = registry[type];
        if (listeners.size === 0) {
            return;
        }

        const envelope: EventEnvelope<typeof type> = { type, payload, timestamp };
        for (const listener of [...listeners]) {
            try {
                listener(envelope);
            } catch (error) {
                logger.error('listener failed', {
                    type,
                    message: error instanceof Error ? error.message : String(error),
                });
            }
        }
    };

    const unsubscribe: CatcherEventBus['unsubscribe'] = (type, listener) => {
        registry[type].delete(listener);
    };

    const subscribe: CatcherEventBus['subscribe'] = (type, listener) => {
        registry[type].add(listener);
        return () => unsubscribe(type, listener);
    };

    const subscribeOnce: CatcherEventBus['subscribeOnce'] = (type, listener) => {
        const release = subscribe(type, (event) => {
            release();
            listener(event);
        });
        return release;
    };

    const clear: CatcherEventBus['clear'] = () => {
        for (const listeners of Object.values(registry)) {
            listeners.clear();
        }
    };

    const listenerCount: CatcherEventBus['listenerCount'] = (type) => registry[type].size;

    return {
        publish,
        subscribe,
        subscribeOnce,
        unsubscribe,
        clear,
        listenerCount,
    };
};
