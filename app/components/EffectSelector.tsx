import { useState, useCallback, ChangeEvent } from 'react';
import { Plus } from 'lucide-react';
import { listAvailable } from '../../lib/effects-catalog';
import { cn } from '../../lib/utils';

export interface EffectSelectorProps {
  /** Called with the selected kind when the user presses Add */
  onAdd: (kind: string) => void;
  disabled?: boolean;
}

/**
 * Dropdown of every registered effect kind plus an Add button
 */
export default function EffectSelector({ onAdd, disabled = false }: EffectSelectorProps) {
  const kinds = listAvailable();
  const [selected, setSelected] = useState<string>(kinds[0]?.id ?? '');

  const handleSelect = useCallback((event: ChangeEvent<HTMLSelectElement>) => {
    setSelected(event.target.value);
  }, []);

  const handleAdd = useCallback(() => {
    if (disabled || !selected) return;
    onAdd(selected);
  }, [disabled, selected, onAdd]);

  return (
    <div className="flex items-center gap-2">
      <label htmlFor="effectSelector" className="text-sm text-zinc-400">
        Select an effect:
      </label>
      <select
        id="effectSelector"
        name="effect"
        value={selected}
        onChange={handleSelect}
        disabled={disabled}
        className="bg-zinc-800 border border-white/10 rounded-md px-2 py-1 text-sm text-zinc-200"
      >
        {kinds.map((kind) => (
          <option key={kind.id} value={kind.id}>
            {kind.label}
          </option>
        ))}
      </select>
      <button
        id="addEffectBtn"
        type="button"
        onClick={handleAdd}
        disabled={disabled}
        className={cn(
          'flex items-center gap-1 px-3 py-1 rounded-md text-sm',
          disabled ? 'text-zinc-500 cursor-not-allowed' : 'bg-white/10 text-zinc-100 hover:bg-white/20'
        )}
      >
        <Plus size={14} aria-hidden="true" />
        Add
      </button>
    </div>
  );
}
