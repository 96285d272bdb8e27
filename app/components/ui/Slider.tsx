import { ChangeEvent, useCallback, useEffect, useId, useRef, useState } from 'react';
import { useDebouncedCallback } from '../../../lib/hooks';
import { cn } from '../../../lib/utils';

/** Default debounce delay in milliseconds for slider onChange callbacks */
export const DEFAULT_DEBOUNCE_MS = 50;

export interface SliderProps {
  value: number;
  min: number;
  max: number;
  step?: number;
  /** Debounced while dragging; called straight away on release and on reset */
  onChange: (value: number) => void;
  label: string;
  disabled?: boolean;
  id?: string;
  debounceMs?: number;
  /** Value restored on double-click; no reset when omitted */
  defaultValue?: number;
  /** Formatter for the value shown next to the label */
  formatValue?: (value: number) => string;
}

/**
 * Range input for one effect parameter.
 *
 * The handle follows the pointer or keyboard through a local draft value.
 * Until the change is released (pointer up or leave, key up, blur) the `value`
 * prop is not copied into the draft, so a late store update cannot pull the
 * handle back.
 */
export default function Slider({
  value,
  min,
  max,
  step = 1,
  onChange,
  label,
  disabled = false,
  id,
  debounceMs = DEFAULT_DEBOUNCE_MS,
  defaultValue,
  formatValue = String,
}: SliderProps) {
  const generatedId = useId();
  const inputId = id ?? `slider-${generatedId}`;

  const [draft, setDraft] = useState(value);
  const [dragging, setDragging] = useState(false);
  const draftRef = useRef(value);

  const debouncedOnChange = useDebouncedCallback(onChange, debounceMs);

  const updateDraft = useCallback((next: number) => {
    draftRef.current = next;
    setDraft(next);
  }, []);

  useEffect(() => {
    if (!dragging) {
      updateDraft(value);
    }
  }, [value, dragging, updateDraft]);

  const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
    const next = Number(event.target.value);
    setDragging(true);
    updateDraft(next);
    debouncedOnChange(next);
  };

  const handleRelease = useCallback(() => {
    if (!dragging) return;
    debouncedOnChange.cancel();
    onChange(draftRef.current);
    setDragging(false);
  }, [dragging, debouncedOnChange, onChange]);

  const handleReset = useCallback(() => {
    if (disabled || defaultValue === undefined) return;
    debouncedOnChange.cancel();
    updateDraft(defaultValue);
    onChange(defaultValue);
  }, [disabled, defaultValue, debouncedOnChange, onChange, updateDraft]);

  return (
    <div className="flex flex-col gap-2 w-full">
      <label htmlFor={inputId} className="text-sm font-medium text-zinc-300 flex items-center gap-1">
        <span>{label}:</span>
        <span data-testid={`${inputId}-value`}>{formatValue(draft)}</span>
      </label>
      <input
        id={inputId}
        type="range"
        min={min}
        max={max}
        step={step}
        value={draft}
        onChange={handleChange}
        onPointerUp={handleRelease}
        onPointerLeave={handleRelease}
        onKeyUp={handleRelease}
        onBlur={handleRelease}
        onDoubleClick={handleReset}
        disabled={disabled}
        className={cn(
          'w-full h-2 rounded-lg appearance-none cursor-pointer bg-zinc-700',
          disabled ? 'cursor-not-allowed' : 'accent-zinc-100'
        )}
        title={defaultValue !== undefined ? 'Double-click to reset' : undefined}
      />
    </div>
  );
}
