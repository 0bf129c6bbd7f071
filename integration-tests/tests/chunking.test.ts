/**
 * Chunking Tests
 */

import {
  NOT_FOUND,
  OVERLAP_SEPARATOR,
  buildClassificationPreview,
  chunkText,
  mergeChunkFields,
  splitIntoBodies,
} from '@docintake/shared';

describe('splitIntoBodies', () => {
  it('packs paragraphs up to the limit', () => {
    expect(splitIntoBodies('aaaa\n\nbbbb\n\ncccc', 10)).toEqual(['aaaa\n\nbbbb', 'cccc']);
  });

  it('cuts an oversized paragraph into fixed slices', () => {
    expect(splitIntoBodies('x'.repeat(25), 10)).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });

  it('never exceeds the limit', () => {
    const text = Array.from({ length: 40 }, (_, i) => `Parágrafo ${i} ${'palavra '.repeat(i % 7)}`).join('\n\n');
    for (const body of splitIntoBodies(text, 60)) {
      expect(body.length).toBeLessThanOrEqual(60);
    }
  });
});

describe('chunkText', () => {
  it('returns short text as a single chunk', () => {
    expect(chunkText('curto', { maxChunkChars: 100, overlapChars: 10 })).toEqual([
      { index: 0, text: 'curto', body: 'curto' },
    ]);
  });

  it('prefixes each later chunk with the tail of the previous body', () => {
    const chunks = chunkText('aaaa\n\nbbbb\n\ncccc', { maxChunkChars: 10, overlapChars: 3 });

    expect(chunks).toEqual([
      { index: 0, text: 'aaaa\n\nbbbb', body: 'aaaa\n\nbbbb' },
      { index: 1, text: `bbb${OVERLAP_SEPARATOR}cccc`, body: 'cccc' },
    ]);
  });

  it('omits the overlap when it is 0', () => {
    const chunks = chunkText('aaaa\n\nbbbb\n\ncccc', { maxChunkChars: 10, overlapChars: 0 });
    expect(chunks[1]?.text).toBe('cccc');
  });
});

describe('mergeChunkFields', () => {
  it('takes the first found value unless a later one is longer', () => {
    const merged = mergeChunkFields(
      [
        { razao_social: NOT_FOUND, valor: 'R$ 1' },
        { razao_social: 'Construtora Modelo', valor: 'R$ 1.500,00' },
        { razao_social: 'Modelo' },
      ],
      ['razao_social', 'valor', 'nome_banco']
    );

    expect(merged).toEqual({
      razao_social: 'Construtora Modelo',
      valor: 'R$ 1.500,00',
      nome_banco: NOT_FOUND,
    });
  });
});

describe('buildClassificationPreview', () => {
  const digits = Array.from({ length: 100 }, (_, i) => String(i % 10)).join('');

  it('keeps short text whole', () => {
    expect(buildClassificationPreview('abc', 10)).toBe('abc');
  });

  it('cuts moderately long text to its head', () => {
    expect(buildClassificationPreview(digits.slice(0, 20), 10)).toBe('0123456789');
  });

  it('samples head, middle and tail of long text', () => {
    expect(buildClassificationPreview(digits, 10)).toBe('0123\n...\n8901\n...\n6789');
  });
});
