/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Components register at module load
 * (e.g. "relay-engine", "dimse-listener"); operators raise a single component
 * to DEBUG or TRACE through RELAY_DEBUG_COMPONENTS without flooding the rest.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component. Re-registering keeps an existing override.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: existing?.levelOverride ?? defaultLevel,
  });
}

/**
 * Override the level of one component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * Effective level for a component. Child loggers ("relay-engine.move")
 * inherit the override of their parent component.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let candidate: string | undefined = name;
  while (candidate) {
    const override = registry.get(candidate)?.levelOverride;
    if (override) return override;
    const dot = candidate.lastIndexOf('.');
    candidate = dot > 0 ? candidate.substring(0, dot) : undefined;
  }
  return globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

export function getRegisteredComponents(globalLevel: LogLevel): Array<{
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}> {
  return [...registry.values()]
    .map((reg) => ({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply entries like ["relay-engine", "dimse-listener:TRACE"].
 * An entry without a level suffix gets DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}
