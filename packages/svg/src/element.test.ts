import { describe, it, expect } from 'vitest';
import { SvgElement, SvgSlot } from './element';
import { escapeXml, formatNumber } from './format';

describe('escapeXml', () => {
  it('should escape markup-significant characters', () => {
    expect(escapeXml(`a<b & "c" 'd'>`)).toBe(
      'a&lt;b &amp; &quot;c&quot; &apos;d&apos;&gt;'
    );
  });
});

describe('formatNumber', () => {
  it('should round and drop trailing zeros', () => {
    expect(formatNumber(1.23456)).toBe('1.235');
    expect(formatNumber(2.5, 0)).toBe('3');
    expect(formatNumber(4)).toBe('4');
  });

  it('should not print negative zero', () => {
    expect(formatNumber(-0.0001)).toBe('0');
  });
});

describe('SvgElement', () => {
  it('should serialize attributes and escaped text', () => {
    const el = new SvgElement('text', { x: 1.23456 });
    el.text = 'a<b & "c"';
    expect(el.markup()).toBe('<text x="1.235">a&lt;b &amp; &quot;c&quot;</text>');
  });

  it('should self-close empty elements and omit null attributes', () => {
    const el = new SvgElement('rect', { width: 2, fill: null });
    expect(el.toString()).toBe('<rect width="2"/>');
  });

  it('should evaluate lazy attributes at markup time', () => {
    let width = 1;
    const el = new SvgElement('rect', { width: () => width });
    width = 5;
    expect(el.markup()).toBe('<rect width="5"/>');
    expect(el.getAttr('width')).toBe(5);
  });

  it('should move a child between parents', () => {
    const a = new SvgElement('g');
    const b = new SvgElement('g');
    const c = new SvgElement('circle');

    a.appendChild(c);
    b.appendChild(c);

    expect(a.children).toEqual([]);
    expect(b.children).toEqual([c]);
    expect(c.parent).toBe(b);
  });

  it('should keep children sorted by order', () => {
    const parent = new SvgElement('g');
    const x = new SvgElement('g', { id: 'x' });
    const y = new SvgElement('g', { id: 'y' });
    y.order = -1;

    parent.appendChild(x);
    parent.appendChild(y);
    expect(parent.children).toEqual([y, x]);

    x.order = -2;
    expect(parent.children).toEqual([x, y]);
  });

  it('should refuse to append an ancestor', () => {
    const a = new SvgElement('g');
    const b = new SvgElement('g');
    a.appendChild(b);
    expect(() => b.appendChild(a)).toThrow(
      'SvgElement.appendChild: <g> cannot contain itself'
    );
  });

  it('should map child bounds through the child matrix', () => {
    const parent = new SvgElement('g');
    const child = new SvgElement('g');
    child.localBounds = { minX: 0, minY: 0, maxX: 2, maxY: 1 };
    child.matrix = [2, 0, 0, 2, 10, 0];
    parent.appendChild(child);

    expect(parent.contentBounds()).toEqual({
      minX: 10,
      minY: 0,
      maxX: 14,
      maxY: 2,
    });

    child.setAttr('display', 'none');
    expect(parent.contentBounds()).toBeNull();
  });

  it('should find elements depth-first', () => {
    const root = new SvgElement('svg');
    const group = new SvgElement('g');
    const rect = new SvgElement('rect');
    group.appendChild(rect);
    root.appendChild(group);

    expect(root.find((el) => el.tag === 'rect')).toBe(rect);
    expect(root.findAll((el) => el.tag !== 'rect')).toEqual([root, group]);
  });
});

describe('SvgSlot', () => {
  it('should render another element without adopting it', () => {
    const target = new SvgElement('circle', { r: 1 });
    target.localBounds = { minX: -1, minY: -1, maxX: 1, maxY: 1 };
    const holder = new SvgElement('g');
    holder.appendChild(new SvgSlot(() => target));

    expect(holder.markup()).toBe('<g><circle r="1"/></g>');
    expect(target.parent).toBeNull();
    expect(holder.contentBounds()).toEqual({ minX: -1, minY: -1, maxX: 1, maxY: 1 });
  });
});
