import { describe, it, expect } from 'vitest';
import { hsvToRgb, parseHexColor, parseHsvColor, resolveColor } from '../src/xdot/colors.js';

describe('color resolution', () => {
  it('decodes #RRGGBBAA channel by channel', () => {
    expect(resolveColor('#ff8000cc')).toEqual([1, 128 / 255, 0, 204 / 255]);
    expect(resolveColor('#00000000')).toEqual([0, 0, 0, 0]);
  });

  it('treats a missing alpha as opaque', () => {
    expect(resolveColor('#336699')).toEqual([0x33 / 255, 0x66 / 255, 0x99 / 255, 1.0]);
  });

  it('treats a malformed alpha as opaque', () => {
    expect(parseHexColor('#336699zz')).toEqual([0x33 / 255, 0x66 / 255, 0x99 / 255, 1.0]);
  });

  it('rejects malformed hex channels', () => {
    expect(parseHexColor('#12')).toBeNull();
    expect(parseHexColor('#gg0000')).toBeNull();
  });

  it('decodes "0 1 1" as pure red', () => {
    expect(resolveColor('0 1 1')).toEqual([1, 0, 0, 1]);
  });

  it('accepts commas between HSV components', () => {
    expect(resolveColor('0.5,1,1')).toEqual([0, 1, 1, 1]);
  });

  it('reads a leading dot as an HSV triple', () => {
    expect(resolveColor('.0 0 .5')).toEqual([0.5, 0.5, 0.5, 1]);
  });

  it('rejects an HSV triple with the wrong arity', () => {
    expect(parseHsvColor('0 1')).toBeNull();
    expect(parseHsvColor('0 1 1 1')).toBeNull();
  });

  it('converts HSV across sectors', () => {
    expect(hsvToRgb(0.25, 1, 1)).toEqual([0.5, 1, 0]);
    expect(hsvToRgb(0.75, 1, 1)).toEqual([0.5, 0, 1]);
    expect(hsvToRgb(0, 0, 0.25)).toEqual([0.25, 0.25, 0.25]);
  });

  it('resolves named colors', () => {
    expect(resolveColor('red')).toEqual([1, 0, 0, 1]);
    expect(resolveColor('white')).toEqual([1, 1, 1, 1]);
  });

  it('strips a color scheme prefix', () => {
    expect(resolveColor('/x11/blue')).toEqual([0, 0, 1, 1]);
  });

  it('resolves transparent to a clear color', () => {
    expect(resolveColor('transparent')).toEqual([0, 0, 0, 0]);
  });

  it('returns null for unknown names', () => {
    expect(resolveColor('notacolor')).toBeNull();
  });
});
