import { beforeAll, describe, it, expect } from 'vitest';
import chalk from 'chalk';
import Decimal from 'decimal.js';
import { createTokenUsage } from 'ocmeter-shared';
import {
  activityColor,
  describeRange,
  fmtInt,
  fmtNum,
  formatAgo,
  formatCost,
  formatDuration,
  makeBar,
  renderTable,
  stripAnsi,
  tokenCells,
  truncate,
  usageColor,
  visibleLength,
} from './formatters';
import type { TableData } from './formatters';

beforeAll(() => {
  chalk.level = 0;
});

describe('stripAnsi', () => {
  it('removes color sequences', () => {
    expect(stripAnsi('\u001b[1mbold\u001b[22m')).toBe('bold');
  });

  it('returns plain text unchanged', () => {
    expect(stripAnsi('no codes here')).toBe('no codes here');
  });
});

describe('visibleLength', () => {
  it('counts only printed characters', () => {
    expect(visibleLength('\u001b[32m$1.00\u001b[39m')).toBe(5);
  });
});

describe('number formatting', () => {
  it('abbreviates large numbers', () => {
    expect(fmtNum(999)).toBe('999');
    expect(fmtNum(1_500)).toBe('1.5K');
    expect(fmtNum(2_500_000)).toBe('2.5M');
  });

  it('groups thousands', () => {
    expect(fmtInt(1_234_567)).toBe('1,234,567');
  });

  it('formats costs with two decimals', () => {
    expect(formatCost(2)).toBe('$2.00');
    expect(formatCost(new Decimal('1.005'))).toBe('$1.01');
    expect(formatCost(new Decimal('0.0006'))).toBe('$0.00');
  });

  it('builds token cells in column order', () => {
    const tokens = createTokenUsage({ input: 1_000, output: 20, cacheWrite: 3, cacheRead: 40_000 });
    expect(tokenCells(tokens)).toEqual(['1,000', '20', '3', '40,000', '41,023']);
  });
});

describe('formatDuration', () => {
  it('uses the largest sensible unit', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1_500)).toBe('1.5s');
    expect(formatDuration(125_000)).toBe('2m5s');
    expect(formatDuration(3_900_000)).toBe('1h5m');
  });

  it('shows a dash without a duration', () => {
    expect(formatDuration(undefined)).toBe('-');
  });
});

describe('formatAgo', () => {
  it('rounds down to whole units', () => {
    expect(formatAgo(5.7)).toBe('5s ago');
    expect(formatAgo(120)).toBe('2m ago');
    expect(formatAgo(7_200)).toBe('2h ago');
  });

  it('says never without activity', () => {
    expect(formatAgo(undefined)).toBe('never');
  });
});

describe('truncate', () => {
  it('keeps short text', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('appends an ellipsis when cut', () => {
    expect(truncate('abcdefghijkl', 8)).toBe('abcde...');
  });
});

describe('makeBar', () => {
  it('fills in proportion to the percentage', () => {
    expect(makeBar(50, 10)).toBe('█████░░░░░');
  });

  it('clamps out-of-range values', () => {
    expect(makeBar(150, 4)).toBe('████');
    expect(makeBar(-5, 4)).toBe('░░░░');
  });
});

describe('colors', () => {
  it('grades usage percentages', () => {
    expect(usageColor(49.9)).toBe('green');
    expect(usageColor(50)).toBe('yellow');
    expect(usageColor(80)).toBe('red');
  });

  it('maps activity classes', () => {
    expect(activityColor('active')).toBe('green');
    expect(activityColor('inactive')).toBe('red');
    expect(activityColor('unknown')).toBe('gray');
  });
});

describe('describeRange', () => {
  it('describes both bounds', () => {
    expect(describeRange('2024-01-01', '2024-01-07')).toBe('2024-01-01 to 2024-01-07');
  });

  it('collapses a single day', () => {
    expect(describeRange('2024-01-01', '2024-01-01')).toBe('2024-01-01');
  });

  it('handles open ranges', () => {
    expect(describeRange('2024-01-01')).toBe('since 2024-01-01');
    expect(describeRange(undefined, '2024-01-07')).toBe('until 2024-01-07');
    expect(describeRange()).toBe('all time');
  });
});

describe('renderTable', () => {
  const table: TableData = {
    columns: [{ header: 'Name' }, { header: 'N', align: 'right' }],
    rows: [['a', '10'], ['bbb', '2']],
  };

  it('renders the minimal style with whitespace only', () => {
    expect(renderTable(table, 'minimal')).toBe('Name   N\na     10\nbbb    2\n');
  });

  it('underlines the header in the simple style', () => {
    expect(renderTable(table, 'simple')).toBe('Name   N\n----  --\na     10\nbbb    2\n');
  });

  it('draws borders and a footer in the rich style', () => {
    const out = renderTable({ ...table, rows: [['a', '10']], footer: ['T', '10'] }, 'rich');
    expect(out.split('\n')).toEqual([
      '┌──────┬────┐',
      '│ Name │  N │',
      '├──────┼────┤',
      '│ a    │ 10 │',
      '├──────┼────┤',
      '│ T    │ 10 │',
      '└──────┴────┘',
      '',
    ]);
  });

  it('sizes columns by printed width', () => {
    const colored: TableData = {
      columns: [{ header: 'X' }],
      rows: [['\u001b[31mabc\u001b[39m']],
    };
    expect(renderTable(colored, 'minimal').split('\n')[0]).toBe('X');
    expect(renderTable(colored, 'simple').split('\n')[1]).toBe('---');
  });
});
