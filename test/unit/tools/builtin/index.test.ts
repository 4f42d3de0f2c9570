import { describe, it, expect } from 'vitest';
import { createTestRegistry, createTestServices } from '../../../helpers/index.js';
import { TOOL_SUBSETS, createBuiltinTools } from '../../../../src/tools/builtin/index.js';

describe('built-in tools', () => {
  it('registers every tool in a stable order', () => {
    const names = createBuiltinTools(createTestServices()).map((tool) => tool.name);

    expect(names).toHaveLength(18);
    expect(names.slice(0, 3)).toEqual(['addTaskToList', 'listCurrentTasks', 'removeTaskFromList']);
    expect(names[names.length - 1]).toBe('getHealthSummary');
  });

  it('defines subsets over registered tools only', () => {
    const registry = createTestRegistry();
    for (const subset of Object.values(TOOL_SUBSETS)) {
      expect(registry.resolveSubset(subset)).toHaveLength(subset.length);
    }
  });

  it('leaves health out of the on-device subset', () => {
    expect(TOOL_SUBSETS.onDeviceFull).toHaveLength(17);
    expect(TOOL_SUBSETS.onDeviceFull).not.toContain('getHealthSummary');
  });

  it('advertises object schemas for every tool', () => {
    for (const definition of createTestRegistry().definitions()) {
      expect(definition.parameterSchema.type).toBe('object');
      expect(definition.description.length).toBeGreaterThan(0);
    }
  });
});
