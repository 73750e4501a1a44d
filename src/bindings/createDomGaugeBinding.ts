import type { GaugeBinding, Rgba01 } from '../config/types';
import { rgba01ToCssRgba } from '../utils/colors';
import { clamp01 } from '../utils/math';

export interface DomGaugeBindingOptions {
  /** Fill element. Defaults to a `[data-gauge-fill]` child of the track, created if absent. */
  readonly fill?: HTMLElement;
  /** Optional text element showing `value/max`. */
  readonly label?: HTMLElement | null;
  readonly formatLabel?: (value: number, max: number) => string;
}

export interface DomGaugeBinding extends GaugeBinding {
  readonly track: HTMLElement;
  readonly fill: HTMLElement;
  /** Stops writing and removes the fill element if this binding created it. */
  dispose(): void;
}

const defaultFormatLabel = (value: number, max: number): string => `${Math.round(value)}/${Math.round(max)}`;

const readAriaNumber = (el: HTMLElement, name: string): number | undefined => {
  const raw = el.getAttribute(name);
  if (raw === null || raw.trim().length === 0) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
};

/**
 * Adapts a progress-bar element (track + fill) to a {@link GaugeBinding}.
 *
 * The fill's width is the value fraction, and color/opacity go to its inline style.
 * The track carries `role="progressbar"` and the aria value attributes.
 */
export function createDomGaugeBinding(track: HTMLElement, options: DomGaugeBindingOptions = {}): DomGaugeBinding {
  let disposed = false;
  const formatLabel = options.formatLabel ?? defaultFormatLabel;
  const label = options.label ?? null;

  const existingFill = options.fill ?? track.querySelector<HTMLElement>('[data-gauge-fill]');
  const ownsFill = existingFill === null;
  const fill = existingFill ?? document.createElement('div');
  if (ownsFill) {
    fill.setAttribute('data-gauge-fill', '');
    fill.style.height = '100%';
    fill.style.width = '0%';
    fill.style.pointerEvents = 'none';
    track.appendChild(fill);
  }

  let value = readAriaNumber(track, 'aria-valuenow');
  let max = Math.max(1, readAriaNumber(track, 'aria-valuemax') ?? 100);

  track.setAttribute('role', 'progressbar');
  track.setAttribute('aria-valuemin', '0');
  track.setAttribute('aria-valuemax', String(Math.round(max)));

  const render = (): void => {
    const v = value ?? 0;
    fill.style.width = `${(clamp01(v / max) * 100).toFixed(1)}%`;
    track.setAttribute('aria-valuenow', String(Math.round(v)));
    if (label) label.textContent = formatLabel(v, max);
  };

  return {
    track,
    fill,
    setValue(next: number): void {
      if (disposed) return;
      value = next;
      render();
    },
    setMax(next: number): void {
      if (disposed) return;
      max = Math.max(1, next);
      track.setAttribute('aria-valuemax', String(Math.round(max)));
      render();
    },
    setFillColor(color: Rgba01): void {
      if (disposed) return;
      fill.style.backgroundColor = rgba01ToCssRgba(color);
    },
    setOpacity(opacity: number): void {
      if (disposed) return;
      fill.style.opacity = String(clamp01(opacity));
    },
    getValue: () => value,
    dispose(): void {
      if (disposed) return;
      disposed = true;
      if (ownsFill) fill.remove();
    },
  };
}
