import { describe, it, expect } from 'vitest';
import { assemble, formatTimestamp } from '@/lib/lecture/assembler';
import type { ScriptHeader, TimedSegment } from '@/types/lecture';

const header: ScriptHeader = {
  title: 'Cell Biology',
  learningObjectives: ['Describe the cell membrane'],
  keyTerms: ['membrane']
};

const segments: TimedSegment[] = [
  {
    chunkIndex: 0,
    title: 'The membrane',
    body: 'Cells are wrapped in a membrane.',
    weight: 1,
    checkpoints: ['What does the membrane do?'],
    startSec: 0,
    durationSec: 90.4
  },
  { chunkIndex: 1, title: 'Transport', body: 'Molecules cross the membrane.', weight: 1, startSec: 90.4, durationSec: 60 }
];

describe('formatTimestamp', () => {
  it('renders minutes and seconds without wrapping hours', () => {
    expect(formatTimestamp(0)).toBe('[00:00]');
    expect(formatTimestamp(125.4)).toBe('[02:05]');
    expect(formatTimestamp(75 * 60)).toBe('[75:00]');
  });
});

describe('assemble', () => {
  it('renders header, timed titles, bodies and checkpoints', () => {
    expect(assemble(segments, header)).toBe(
      [
        '# Cell Biology',
        '',
        '## Learning Objectives',
        '- Describe the cell membrane',
        '',
        'Key terms: membrane',
        '',
        '[00:00] The membrane',
        'Cells are wrapped in a membrane.',
        '',
        'Check your understanding:',
        '- What does the membrane do?',
        '',
        '[01:30] Transport',
        'Molecules cross the membrane.',
        ''
      ].join('\n')
    );
  });

  it('is byte-identical across runs', () => {
    expect(assemble(segments, header)).toBe(assemble(segments, header));
  });

  it('omits empty header sections', () => {
    expect(assemble([segments[1]], { title: 'Only', learningObjectives: [] })).toBe(
      '# Only\n\n[01:30] Transport\nMolecules cross the membrane.\n'
    );
  });
});
