import { EventBus } from '../core/events/EventBus';

interface TestEvents {
    'item:added': { id: string };
    'item:removed': string;
}

describe('EventBus', () => {
    let bus: EventBus<TestEvents>;

    beforeEach(() => {
        bus = new EventBus<TestEvents>();
    });

    it('should deliver events to subscribed handlers', () => {
        const handler = jest.fn();
        bus.on('item:added', handler);

        bus.emit('item:added', { id: 'a' });

        expect(handler).toHaveBeenCalledWith({ id: 'a' });
    });

    it('should stop delivering after off', () => {
        const handler = jest.fn();
        bus.on('item:removed', handler);
        bus.off('item:removed', handler);

        bus.emit('item:removed', 'a');

        expect(handler).not.toHaveBeenCalled();
    });

    it('should keep publishing when a handler throws', () => {
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const after = jest.fn();
        bus.on('item:added', () => {
            throw new Error('handler failed');
        });
        bus.on('item:added', after);

        expect(() => bus.emit('item:added', { id: 'a' })).not.toThrow();
        expect(after).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        errorSpy.mockRestore();
    });
});
