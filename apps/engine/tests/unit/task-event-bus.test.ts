import { TaskEventBus, TaskEvent } from '../../src/events/task-event-bus';
import { makeTask } from '../helpers/tasks';

describe('TaskEventBus', () => {
    let bus: TaskEventBus;

    beforeEach(() => {
        bus = new TaskEventBus();
    });

    it('delivers on a later turn, in publish order', async () => {
        const seen: string[] = [];
        bus.onAny((event) => {
            seen.push(`${event.type}:${event.task.id}`);
        });

        bus.publish('queued', makeTask({ id: 'a' }));
        bus.publish('updated', makeTask({ id: 'a' }), 'Task started');
        bus.publish('completed', makeTask({ id: 'a' }));
        expect(seen).toEqual([]);

        await bus.flush();
        expect(seen).toEqual(['queued:a', 'updated:a', 'completed:a']);
    });

    it('only hands typed listeners their own channel', async () => {
        const completed = jest.fn();
        bus.subscribe('completed', completed);

        bus.publish('queued', makeTask({ id: 'a' }));
        bus.publish('completed', makeTask({ id: 'a' }), 'Task completed');
        await bus.flush();

        expect(completed).toHaveBeenCalledTimes(1);
        const event: TaskEvent = completed.mock.calls[0][0];
        expect(event.type).toBe('completed');
        expect(event.message).toBe('Task completed');
        expect(event.at).toBeInstanceOf(Date);
    });

    it('snapshots the task at publish time', async () => {
        const task = makeTask({ id: 'a' });
        const seen: number[] = [];
        bus.subscribe('updated', (event) => {
            seen.push(event.task.processedItems);
        });

        task.processedItems = 5;
        bus.publish('updated', task);
        task.processedItems = 9;
        await bus.flush();

        expect(seen).toEqual([5]);
    });

    it('stops delivering after unsubscribe', async () => {
        const listener = jest.fn();
        const unsubscribe = bus.subscribe('queued', listener);
        const unsubscribeAny = bus.onAny(listener);
        expect(bus.listenerCount('queued')).toBe(2);
        expect(bus.listenerCount('updated')).toBe(1);

        unsubscribe();
        unsubscribeAny();
        bus.publish('queued', makeTask());
        await bus.flush();

        expect(listener).not.toHaveBeenCalled();
        expect(bus.listenerCount()).toBe(0);
    });

    it('isolates failing listeners', async () => {
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const healthy = jest.fn();
        bus.subscribe('queued', () => {
            throw new Error('sync failure');
        });
        bus.subscribe('queued', async () => {
            throw new Error('async failure');
        });
        bus.subscribe('queued', healthy);

        bus.publish('queued', makeTask({ id: 'a' }));
        await bus.flush();
        await new Promise((resolve) => setImmediate(resolve));

        expect(healthy).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledTimes(2);
        errorSpy.mockRestore();
    });

    it('flush waits for events published by listeners', async () => {
        const seen: string[] = [];
        bus.subscribe('queued', (event) => {
            bus.publish('updated', event.task, 'follow-up');
        });
        bus.subscribe('updated', (event) => {
            seen.push(event.message ?? '');
        });

        bus.publish('queued', makeTask());
        await bus.flush();

        expect(seen).toEqual(['follow-up']);
    });

    it('flush resolves immediately when idle', async () => {
        await expect(bus.flush()).resolves.toBeUndefined();
    });

    it('clear removes every listener', () => {
        bus.subscribe('queued', jest.fn());
        bus.onAny(jest.fn());

        bus.clear();

        expect(bus.listenerCount()).toBe(0);
    });
});
