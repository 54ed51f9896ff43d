import { describe, test, expect } from 'vitest';
import { ToolRegistry, isToolProfile } from './registry.js';
import { readFileTool } from './dev/file-tools.js';

describe('ToolRegistry', () => {
  const registry = new ToolRegistry();

  test('registers the file, shell and browser tools', () => {
    expect(registry.getAllToolNames()).toEqual([
      'read_file',
      'write_file',
      'edit_file',
      'glob_search',
      'grep_search',
      'bash',
      'bash_output',
      'kill_shell',
      'puppeteer_connect_active_tab',
      'puppeteer_navigate',
      'puppeteer_screenshot',
      'puppeteer_click',
      'puppeteer_fill',
      'puppeteer_select',
      'puppeteer_hover',
      'puppeteer_evaluate',
    ]);
  });

  test('filters by profile', () => {
    expect(registry.getToolsForProfile('readonly').map((t) => t.name)).toEqual([
      'read_file',
      'glob_search',
      'grep_search',
    ]);
    expect(registry.getToolsForProfile('full')).toHaveLength(16);
    expect(registry.getTool('bash', 'readonly')).toBeUndefined();
    expect(registry.getTool('read_file', 'readonly')?.name).toBe('read_file');
  });

  test('accepts the MCP prefix for browser tools only', () => {
    expect(registry.getTool('mcp__puppeteer__puppeteer_navigate')?.name).toBe('puppeteer_navigate');
    expect(registry.hasTool('mcp__puppeteer__puppeteer_click')).toBe(true);
    expect(registry.getTool('mcp__puppeteer__read_file')).toBeUndefined();
  });

  test('rejects duplicate names', () => {
    expect(() => new ToolRegistry([readFileTool, readFileTool])).toThrow('Tool read_file is already registered');
  });

  test('recognises profile names', () => {
    expect(isToolProfile('readonly')).toBe(true);
    expect(isToolProfile('admin')).toBe(false);
    expect(isToolProfile('toString')).toBe(false);
  });
});
