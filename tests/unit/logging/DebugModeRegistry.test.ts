import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  shouldLog,
  getRegisteredComponents,
  initFromEnv,
  resetDebugRegistry,
} from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('DebugModeRegistry', () => {
  beforeEach(() => {
    resetDebugRegistry();
  });

  describe('registerComponent', () => {
    it('should list components sorted by name', () => {
      registerComponent('relay-engine', 'Per-study relay pipeline');
      registerComponent('association', 'DIMSE association service');

      const components = getRegisteredComponents(LogLevel.INFO);

      expect(components.map((c) => c.name)).toEqual(['association', 'relay-engine']);
      expect(components[1]!.description).toBe('Per-study relay pipeline');
      expect(components[1]!.effectiveLevel).toBe(LogLevel.INFO);
      expect(components[1]!.hasOverride).toBe(false);
    });

    it('should apply a default level override', () => {
      registerComponent('receiver', 'Inbound object writer', LogLevel.DEBUG);
      const [component] = getRegisteredComponents(LogLevel.INFO);
      expect(component!.effectiveLevel).toBe(LogLevel.DEBUG);
      expect(component!.hasOverride).toBe(true);
    });

    it('should keep an existing override when registered again', () => {
      setComponentLevel('poller', LogLevel.TRACE);
      registerComponent('poller', 'Study discovery loop');
      expect(getEffectiveLevel('poller', LogLevel.INFO)).toBe(LogLevel.TRACE);
      expect(getRegisteredComponents(LogLevel.INFO)[0]!.description).toBe('Study discovery loop');
    });
  });

  describe('levels', () => {
    it('should fall back to the global level without an override', () => {
      registerComponent('delivery', 'Delivery');
      expect(getEffectiveLevel('delivery', LogLevel.WARN)).toBe(LogLevel.WARN);
      expect(shouldLog('delivery', LogLevel.INFO, LogLevel.WARN)).toBe(false);
    });

    it('should let a child component inherit its parent override', () => {
      setComponentLevel('relay-engine', LogLevel.DEBUG);
      expect(getEffectiveLevel('relay-engine.move', LogLevel.INFO)).toBe(LogLevel.DEBUG);
      expect(shouldLog('relay-engine.move', LogLevel.DEBUG, LogLevel.INFO)).toBe(true);
    });

    it('should restore the global level after clearing an override', () => {
      setComponentLevel('retrieval', LogLevel.TRACE);
      clearComponentLevel('retrieval');
      expect(getEffectiveLevel('retrieval', LogLevel.INFO)).toBe(LogLevel.INFO);
    });
  });

  describe('initFromEnv', () => {
    it('should give bare names DEBUG and honour a level suffix', () => {
      initFromEnv(['relay-engine', 'association:TRACE']);
      expect(getEffectiveLevel('relay-engine', LogLevel.INFO)).toBe(LogLevel.DEBUG);
      expect(getEffectiveLevel('association', LogLevel.INFO)).toBe(LogLevel.TRACE);
    });
  });
});
