import { describe, it, expect } from 'vitest';
import type { Polygon, Position } from '@wavefront/shared';
import { composedCut, fromLongitude } from '../cut-engine';
import { areaSize, isCutPosition, planarArea, ringArea } from '../polygon-engine';
import { splitArea, splitPolygon } from '../split-engine';

const p = (lat: number, lng: number): Position => ({ lat, lng });
const coords = (polygon: Polygon) => polygon.map(({ lat, lng }) => [lat, lng]);
const totalArea = (polygons: Polygon[]) => polygons.reduce((sum, polygon) => sum + Math.abs(planarArea(polygon)), 0);

// lat 0..10, lng 0..10
const square: Polygon = [p(0, 0), p(0, 10), p(10, 10), p(10, 0), p(0, 0)];

describe('Polygon Splitter', () => {
  const cut = fromLongitude(5);

  it('splits a square along a meridian', () => {
    const { left, right } = splitPolygon(square, cut);

    expect(left).toHaveLength(1);
    expect(right).toHaveLength(1);
    expect(coords(left[0])).toEqual([[10, 5], [10, 0], [0, 0], [0, 5], [10, 5]]);
    expect(coords(right[0])).toEqual([[0, 5], [0, 10], [10, 10], [10, 5], [0, 5]]);
  });

  it('tags the inserted vertices with the cut', () => {
    const { left } = splitPolygon(square, cut);
    const cutVertices = left[0].filter(isCutPosition);

    // Two crossings plus the closing vertex
    expect(cutVertices).toHaveLength(3);
    expect(cutVertices.every(v => v.cutId === 'lng:5')).toBe(true);
  });

  it('keeps both halves adding up to the original', () => {
    const { left, right } = splitPolygon(square, cut);
    expect(totalArea(left)).toBe(50);
    expect(totalArea(right)).toBe(50);
  });

  it('is idempotent on an already split side', () => {
    const { left } = splitPolygon(square, cut);
    const again = splitPolygon(left[0], cut);

    expect(again.right).toEqual([]);
    expect(again.left).toHaveLength(1);
    expect(again.left[0]).toBe(left[0]);
  });

  it('is deterministic', () => {
    expect(splitPolygon(square, cut)).toEqual(splitPolygon(square, cut));
  });

  it('returns the polygon untouched when it lies on one side', () => {
    const east = splitPolygon(square, fromLongitude(-3));
    expect(east.left).toEqual([]);
    expect(east.right[0]).toBe(square);

    const west = splitPolygon(square, fromLongitude(20));
    expect(west.left[0]).toBe(square);
    expect(west.right).toEqual([]);
  });

  it('returns nothing for degenerate rings', () => {
    expect(splitPolygon([p(0, 0), p(1, 1), p(0, 0)], cut)).toEqual({ left: [], right: [] });
  });

  it('shares a vertex lying on the cut', () => {
    const triangle: Polygon = [p(0, 0), p(10, 5), p(0, 10), p(0, 0)];
    const { left, right } = splitPolygon(triangle, cut);

    expect(coords(left[0])).toEqual([[0, 5], [0, 0], [10, 5], [0, 5]]);
    expect(coords(right[0])).toEqual([[10, 5], [0, 10], [0, 5], [10, 5]]);
  });

  it('splits a concave shape into several pieces', () => {
    // C shape opening east: 30 x 30 with a notch at lat 10..20, lng 10..30
    const shape: Polygon = [
      p(0, 0), p(0, 30), p(10, 30), p(10, 10), p(20, 10), p(20, 30), p(30, 30), p(30, 0), p(0, 0),
    ];
    const { left, right } = splitPolygon(shape, fromLongitude(20));

    expect(right).toHaveLength(2);
    expect(right.map(polygon => Math.abs(planarArea(polygon)))).toEqual([100, 100]);
    expect(left).toHaveLength(1);
    expect(Math.abs(planarArea(left[0]))).toBe(500);
  });

  it('splits along a composed cut', () => {
    const bent = composedCut([p(0, 2), p(5, 8), p(10, 3)]);
    const { left, right } = splitPolygon(square, bent);

    expect(left).toHaveLength(1);
    expect(right).toHaveLength(1);
    // Area west of the polyline: 5 * (2 + 8) / 2 + 5 * (8 + 3) / 2
    expect(totalArea(left)).toBeCloseTo(52.5, 9);
    expect(totalArea(right)).toBeCloseTo(47.5, 9);
    // The bend of the cut shows up on both sides
    expect(coords(left[0])).toContainEqual([5, 8]);
    expect(coords(right[0])).toContainEqual([5, 8]);
  });

  it('keeps the geodesic area across straight and composed cuts', () => {
    const whole = ringArea(square);
    for (const front of [cut, composedCut([p(0, 2), p(5, 8), p(10, 3)])]) {
      const { left, right } = splitPolygon(square, front);
      expect((areaSize(left) + areaSize(right)) / whole).toBeCloseTo(1, 9);
    }
  });

  it('splits every polygon of an area', () => {
    const shifted: Polygon = square.map(({ lat, lng }) => p(lat + 20, lng));
    const { left, right } = splitArea([square, shifted], cut);

    expect(left).toHaveLength(2);
    expect(right).toHaveLength(2);
    expect(totalArea(left) + totalArea(right)).toBe(200);
  });
});
