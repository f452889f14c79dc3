import { describe, it, expect } from 'vitest';
import {
  TYPE_WEIGHTS,
  TYPE_WIDTHS,
  isTypeSlope,
  isTypeWeight,
  isTypeWidth,
  slopeFromItal,
  slopeFromSelection,
  slopeFromSlnt,
  weightFromWght,
  weightRank,
  weightValue,
  widthFromWdth,
  widthFromWidthClass,
  widthRank
} from '../../src/fonts/characteristics.js';

describe('characteristics', () => {
  describe('weightFromWght', () => {
    it('maps CSS weights to their buckets', () => {
      expect(TYPE_WEIGHTS.map((_, i) => weightFromWght((i + 1) * 100))).toEqual([...TYPE_WEIGHTS]);
    });

    it('uses half-open breakpoints', () => {
      expect(weightFromWght(149.9)).toBe('thin');
      expect(weightFromWght(150)).toBe('extra-light');
      expect(weightFromWght(449)).toBe('regular');
      expect(weightFromWght(450)).toBe('medium');
      expect(weightFromWght(850)).toBe('heavy');
      expect(weightFromWght(1000)).toBe('heavy');
      expect(weightFromWght(1)).toBe('thin');
    });

    it('is monotonic', () => {
      let previous = -1;
      for (let wght = 1; wght <= 1000; wght += 7) {
        const rank = weightRank(weightFromWght(wght));
        expect(rank).toBeGreaterThanOrEqual(previous);
        previous = rank;
      }
    });

    it('maps non-finite input to regular', () => {
      expect(weightFromWght(Number.NaN)).toBe('regular');
      expect(weightFromWght(Number.POSITIVE_INFINITY)).toBe('regular');
    });
  });

  describe('widthFromWdth', () => {
    it('maps the OS/2 width percentages to their buckets', () => {
      const percentages = [50, 62.5, 75, 87.5, 100, 112.5, 125, 150, 200];
      expect(percentages.map(widthFromWdth)).toEqual([...TYPE_WIDTHS]);
    });

    it('uses midpoints as breakpoints', () => {
      expect(widthFromWdth(93.74)).toBe('semi-condensed');
      expect(widthFromWdth(93.75)).toBe('normal');
      expect(widthFromWdth(174)).toBe('extra-expanded');
      expect(widthFromWdth(175)).toBe('ultra-expanded');
      expect(widthFromWdth(10)).toBe('ultra-condensed');
    });

    it('maps non-finite input to normal', () => {
      expect(widthFromWdth(Number.NaN)).toBe('normal');
    });
  });

  it('maps ital values', () => {
    expect(slopeFromItal(0)).toBe('plain');
    expect(slopeFromItal(0.5)).toBe('plain');
    expect(slopeFromItal(1)).toBe('italic');
  });

  it('maps slnt values', () => {
    expect(slopeFromSlnt(0)).toBe('plain');
    expect(slopeFromSlnt(-12)).toBe('oblique');
    expect(slopeFromSlnt(Number.NaN)).toBe('plain');
  });

  it('maps OS/2 width classes with clamping', () => {
    expect(widthFromWidthClass(1)).toBe('ultra-condensed');
    expect(widthFromWidthClass(5)).toBe('normal');
    expect(widthFromWidthClass(9)).toBe('ultra-expanded');
    expect(widthFromWidthClass(0)).toBe('ultra-condensed');
    expect(widthFromWidthClass(12)).toBe('ultra-expanded');
  });

  it('prefers the oblique selection bit over the italic bit', () => {
    expect(slopeFromSelection(0)).toBe('plain');
    expect(slopeFromSelection(0x40)).toBe('plain');
    expect(slopeFromSelection(0x01)).toBe('italic');
    expect(slopeFromSelection(0x200)).toBe('oblique');
    expect(slopeFromSelection(0x201)).toBe('oblique');
  });

  it('ranks and values', () => {
    expect(widthRank('ultra-condensed')).toBe(0);
    expect(widthRank('ultra-expanded')).toBe(8);
    expect(weightValue('regular')).toBe(400);
    expect(weightValue('heavy')).toBe(900);
  });

  it('recognizes its own values', () => {
    expect(isTypeWidth('semi-condensed')).toBe(true);
    expect(isTypeWidth('narrow')).toBe(false);
    expect(isTypeWeight('semi-bold')).toBe(true);
    expect(isTypeWeight('semibold')).toBe(false);
    expect(isTypeSlope('oblique')).toBe(true);
    expect(isTypeSlope('normal')).toBe(false);
  });
});
