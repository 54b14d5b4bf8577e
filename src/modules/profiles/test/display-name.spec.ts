import { normalizeDisplayName, randomDisplayName } from '../display-name';

describe('display name', () => {
  it('random names are "Adjective Animal"', () => {
    for (let i = 0; i < 50; i++) {
      expect(randomDisplayName()).toMatch(/^[A-Z][a-z]+ [A-Z][a-z]+$/);
    }
  });

  it('collapses whitespace and trims', () => {
    expect(normalizeDisplayName('  Quiet \n\t Owl  ')).toEqual({
      ok: true,
      name: 'Quiet Owl',
    });
  });

  it('strips markup but keeps its text', () => {
    expect(normalizeDisplayName('<b>Bold</b> Fox')).toEqual({
      ok: true,
      name: 'Bold Fox',
    });
  });

  it('drops script contents entirely', () => {
    expect(normalizeDisplayName('<script>alert(1)</script>Lynx')).toEqual({
      ok: true,
      name: 'Lynx',
    });
  });

  it('accepts exactly 15 code points and rejects 16', () => {
    expect(normalizeDisplayName('a'.repeat(15))).toEqual({
      ok: true,
      name: 'a'.repeat(15),
    });
    expect(normalizeDisplayName('a'.repeat(16)).ok).toBe(false);
  });

  it('counts non-latin letters as single characters', () => {
    const name = 'Тихий Филин Ёж';
    expect(normalizeDisplayName(name)).toEqual({ ok: true, name });
  });

  it('rejects empty and punctuation-bearing names', () => {
    expect(normalizeDisplayName('   ')).toEqual({
      ok: false,
      reason: 'Display name must not be empty',
    });
    expect(normalizeDisplayName('<i></i>').ok).toBe(false);
    expect(normalizeDisplayName('Owl!')).toEqual({
      ok: false,
      reason: 'Display name may contain only letters, digits and spaces',
    });
  });
});
