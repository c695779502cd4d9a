import { describe, it, expect } from 'vitest';
import { colormapNames, hasColormap, sampleColormap } from './colormaps';
import { isSvgMarker, markerElement } from './markers';

describe('markerElement', () => {
  it('should draw a diamond as a polygon', () => {
    expect(markerElement('diamond', 0, 0, 4, 3).markup()).toBe(
      '<polygon points="0,-2 2,0 0,2 -2,0"/>'
    );
  });

  it('should centre squares on the coordinate', () => {
    expect(markerElement('square', 5, 5, 2, 3).markup()).toBe(
      '<rect x="4" y="4" width="2" height="2"/>'
    );
  });

  it('should point triangles up or down', () => {
    expect(markerElement('triangle_up', 0, 0, 2, 3).getAttr('points')).toBe(
      '0,-1 1,1 -1,1'
    );
    expect(markerElement('triangle_down', 0, 0, 2, 3).getAttr('points')).toBe(
      '0,1 -1,-1 1,-1'
    );
  });

  it('should leave rings unfilled', () => {
    expect(markerElement('ring', 1, 2, 4, 3).markup()).toBe(
      '<circle cx="1" cy="2" r="2" fill="none"/>'
    );
  });

  it('should draw stars with ten vertices', () => {
    const points = markerElement('star', 0, 0, 10, 3).getAttr('points');
    expect(String(points).split(' ')).toHaveLength(10);
    expect(String(points).split(' ')[0]).toBe('0,-5');
  });

  it('should only accept drawable symbols', () => {
    expect(isSvgMarker('cross')).toBe(true);
    expect(isSvgMarker('arrow')).toBe(false);
  });
});

describe('sampleColormap', () => {
  it('should interpolate between stops', () => {
    expect(sampleColormap('gray', 0)).toBe('#000000');
    expect(sampleColormap('gray', 1 / 3)).toBe('#555555');
    expect(sampleColormap('viridis', 0.5)).toBe('#21918c');
    expect(sampleColormap('viridis', 1)).toBe('#fde725');
  });

  it('should clamp out-of-range positions', () => {
    expect(sampleColormap('red', 2)).toBe('#ff0000');
    expect(sampleColormap('red', -1)).toBe('#000000');
  });

  it('should list every map by name', () => {
    expect(colormapNames()).toEqual([
      'gray',
      'grey',
      'red',
      'green',
      'blue',
      'viridis',
      'magma',
    ]);
    expect(colormapNames().every(hasColormap)).toBe(true);
  });

  it('should reject unknown maps', () => {
    expect(hasColormap('jet')).toBe(false);
    expect(() => sampleColormap('jet', 0)).toThrow(
      'sampleColormap: unknown colormap "jet"'
    );
  });
});
