import { AgentRegistry } from '../src/agent';
import { AgentCategory } from '../src/types';

describe('AgentRegistry', () => {
    let registry: AgentRegistry;
    const noop = async () => undefined;

    beforeEach(() => {
        registry = new AgentRegistry();
    });

    it('registers and looks up a handler by category', () => {
        const registered = registry.register(AgentCategory.CLEANUP, noop);

        expect(registered).toEqual({ category: AgentCategory.CLEANUP, handler: noop });
        expect(registry.get(AgentCategory.CLEANUP)).toBe(registered);
        expect(registry.get(AgentCategory.BACKUP)).toBeUndefined();
    });

    it('accepts the hyphenated category values', () => {
        registry.register('duplicate-detection', noop);
        expect(registry.list()).toEqual([AgentCategory.DUPLICATE_DETECTION]);
    });

    it('rejects a second handler for the same category', () => {
        registry.register(AgentCategory.SEARCH, noop);
        expect(() => registry.register(AgentCategory.SEARCH, noop))
            .toThrow('An agent for "search" is already registered.');
    });

    it('rejects unknown and empty categories', () => {
        expect(() => registry.register('defragment', noop)).toThrow('Unknown agent category "defragment"');
        expect(() => registry.register('', noop)).toThrow('Agent category cannot be empty');
    });

    it('unregisters a handler', () => {
        registry.register(AgentCategory.BACKUP, noop);

        expect(registry.unregister(AgentCategory.BACKUP)).toBe(true);
        expect(registry.unregister(AgentCategory.BACKUP)).toBe(false);
        expect(registry.list()).toEqual([]);
    });
});
