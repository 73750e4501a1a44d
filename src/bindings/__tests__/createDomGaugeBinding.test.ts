// @vitest-environment jsdom
import { describe, it, expect, beforeEach } from 'vitest';
import { createDomGaugeBinding } from '../createDomGaugeBinding';

describe('createDomGaugeBinding', () => {
  let track: HTMLDivElement;

  beforeEach(() => {
    document.body.innerHTML = '';
    track = document.createElement('div');
    document.body.appendChild(track);
  });

  it('creates a fill element and marks the track as a progress bar', () => {
    const binding = createDomGaugeBinding(track);

    expect(binding.track).toBe(track);
    expect(binding.fill.parentElement).toBe(track);
    expect(binding.fill.hasAttribute('data-gauge-fill')).toBe(true);
    expect(track.getAttribute('role')).toBe('progressbar');
    expect(track.getAttribute('aria-valuemin')).toBe('0');
    expect(track.getAttribute('aria-valuemax')).toBe('100');
    expect(binding.getValue?.()).toBeUndefined();
  });

  it('reuses an existing [data-gauge-fill] child', () => {
    const fill = document.createElement('span');
    fill.setAttribute('data-gauge-fill', '');
    track.appendChild(fill);

    const binding = createDomGaugeBinding(track);

    expect(binding.fill).toBe(fill);
    expect(track.children).toHaveLength(1);
  });

  it('reads the displayed value and max from aria attributes', () => {
    track.setAttribute('aria-valuenow', '35');
    track.setAttribute('aria-valuemax', '70');

    const binding = createDomGaugeBinding(track);

    expect(binding.getValue?.()).toBe(35);
    expect(track.getAttribute('aria-valuemax')).toBe('70');
  });

  it('writes the fraction as fill width and the rounded value to aria and the label', () => {
    const label = document.createElement('span');
    const binding = createDomGaugeBinding(track, { label });

    binding.setMax(80);
    binding.setValue(20.4);

    expect(parseFloat(binding.fill.style.width)).toBeCloseTo(25.5, 5);
    expect(track.getAttribute('aria-valuenow')).toBe('20');
    expect(track.getAttribute('aria-valuemax')).toBe('80');
    expect(label.textContent).toBe('20/80');
    expect(binding.getValue?.()).toBe(20.4);
  });

  it('keeps the max at least 1 and the width within the track', () => {
    const binding = createDomGaugeBinding(track);

    binding.setMax(0);
    binding.setValue(5);

    expect(track.getAttribute('aria-valuemax')).toBe('1');
    expect(parseFloat(binding.fill.style.width)).toBe(100);
  });

  it('uses a custom label formatter', () => {
    const label = document.createElement('span');
    const binding = createDomGaugeBinding(track, {
      label,
      formatLabel: (value, max) => `${Math.round((value / max) * 100)}%`,
    });

    binding.setMax(200);
    binding.setValue(50);

    expect(label.textContent).toBe('25%');
  });

  it('clamps opacity into [0, 1]', () => {
    const binding = createDomGaugeBinding(track);

    binding.setOpacity(0.7);
    expect(Number(binding.fill.style.opacity)).toBeCloseTo(0.7, 5);

    binding.setOpacity(3);
    expect(Number(binding.fill.style.opacity)).toBe(1);
  });

  it('writes the fill color', () => {
    const binding = createDomGaugeBinding(track);
    binding.setFillColor([1, 0, 0, 1]);
    expect(binding.fill.style.backgroundColor).not.toBe('');
  });

  it('stops writing after dispose and removes the fill it created', () => {
    const binding = createDomGaugeBinding(track);
    binding.setValue(10);
    const fill = binding.fill;

    binding.dispose();
    binding.dispose();
    binding.setValue(90);

    expect(fill.isConnected).toBe(false);
    expect(track.getAttribute('aria-valuenow')).toBe('10');
  });

  it('leaves a caller-provided fill in place on dispose', () => {
    const fill = document.createElement('div');
    track.appendChild(fill);

    const binding = createDomGaugeBinding(track, { fill });
    binding.dispose();

    expect(fill.parentElement).toBe(track);
  });
});
