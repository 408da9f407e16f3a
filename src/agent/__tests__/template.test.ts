import { describe, it, expect } from 'vitest';
import { renderTemplate } from '../template.js';

describe('renderTemplate', () => {
  it('substitutes known placeholders', () => {
    expect(renderTemplate('{a} and {b}', { a: '1', b: '2' })).toBe('1 and 2');
  });

  it('turns doubled braces into literal braces', () => {
    expect(renderTemplate('{{"status": "{s}"}}', { s: 'APPROVED' })).toBe('{"status": "APPROVED"}');
  });

  it('leaves unknown placeholders alone', () => {
    expect(renderTemplate('{missing}', {})).toBe('{missing}');
  });

  it('does not re-scan substituted values', () => {
    expect(renderTemplate('{code}', { code: 'def f(): return {x}', x: 'boom' })).toBe('def f(): return {x}');
  });
});
