/**
 * Viewport Tests
 */

import { describe, test, expect } from 'vitest';
import { Viewport } from '../../../src/core/viewport.ts';

describe('Viewport', () => {
  test('reports its bounds', () => {
    const viewport = new Viewport(10, 40);
    expect(viewport.maxRow).toBe(9);
    expect(viewport.maxCol).toBe(39);
  });

  test('requiredScroll is zero inside the window and signed outside it', () => {
    const viewport = new Viewport(10, 40);
    expect(viewport.requiredScroll(5)).toBe(0);
    expect(viewport.requiredScroll(12)).toBe(3);

    viewport.scrollBy(20);
    expect(viewport.requiredScroll(18)).toBe(-2);
  });

  test('requiredPan follows the visual column', () => {
    const viewport = new Viewport(10, 40);
    expect(viewport.requiredPan(39)).toBe(0);
    expect(viewport.requiredPan(45)).toBe(6);

    viewport.panBy(6);
    expect(viewport.minCol).toBe(6);
    expect(viewport.requiredPan(0)).toBe(-6);
  });

  test('scroll and pan never move the origin below zero', () => {
    const viewport = new Viewport(10, 40);
    viewport.scrollBy(-5);
    viewport.panBy(-3);
    expect(viewport.minRow).toBe(0);
    expect(viewport.minCol).toBe(0);
  });

  test('resize keeps the origin and reset returns to it', () => {
    const viewport = new Viewport(10, 40);
    viewport.scrollBy(4);
    viewport.resize(5, 20);
    expect(viewport.minRow).toBe(4);
    expect(viewport.maxRow).toBe(8);

    viewport.reset();
    expect(viewport.minRow).toBe(0);
  });

  test('sizes are at least one cell', () => {
    const viewport = new Viewport(0, -3);
    expect(viewport.height).toBe(1);
    expect(viewport.width).toBe(1);
  });
});
