import { describe, it, expect } from 'vitest';
import { TOOL_SPECS, getToolSpecs, getTools } from '../src/tools/registry.js';

describe('RINEX MCP tool contracts', () => {
  it('all tools have valid names', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.name).toMatch(/^rinex_[a-z_]+$/);
    }
  });

  it('all tools have descriptions', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.description.length).toBeGreaterThan(10);
    }
  });

  it('getTools returns valid MCP tool definitions', () => {
    for (const mode of ['standard', 'full'] as const) {
      for (const tool of getTools(mode)) {
        expect(tool.inputSchema.type).toBe('object');
        expect(tool.inputSchema.$schema).toBeUndefined();
        expect(tool.inputSchema.properties).toBeDefined();
      }
    }
  });

  it('all tool names are unique', () => {
    const names = TOOL_SPECS.map(s => s.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('marks path as required', () => {
    const read = getTools('standard').find(t => t.name === 'rinex_read');
    expect(read?.inputSchema.required).toEqual(['path']);
  });

  it('expected tool counts per mode', () => {
    expect(TOOL_SPECS.length).toBe(4);
    expect(getToolSpecs('standard').map(s => s.name)).toEqual(['rinex_info', 'rinex_read', 'rinex_times']);
    expect(getTools('full').map(t => t.name)).toContain('rinex_batch_summary');
  });
});
