import { useCallback } from 'react';
import { motion, AnimatePresence } from 'framer-motion';
import Slider from './ui/Slider';
import { useEditorStore } from '../../lib/hooks';
import { getEffectDefinition, getEffectIcon } from '../../lib/effects-catalog';
import type { EditorStore } from '../../lib/store';
import { formatEffectValue } from '../../lib/utils';

export interface EffectControlsProps {
  store: EditorStore;
  disabled?: boolean;
  debounceMs?: number;
}

/**
 * Entry animation for each newly added control
 */
const controlVariants = {
  initial: { opacity: 0, y: 12 },
  animate: { opacity: 1, y: 0 },
  exit: { opacity: 0, y: 12 },
};

/**
 * One slider per effect instance, in pipeline order.
 * Each slider is bound to its instance id; changes go back through the store.
 */
export default function EffectControls({ store, disabled = false, debounceMs }: EffectControlsProps) {
  const controls = useEditorStore(store, (state) => state.controls);
  const setValue = useEditorStore(store, (state) => state.setValue);

  const handleChange = useCallback((id: string, value: number) => {
    setValue(id, value);
  }, [setValue]);

  return (
    <div id="effects" className="flex flex-col gap-4" data-testid="effect-controls">
      <AnimatePresence initial={false}>
        {controls.map((control) => {
          const Icon = getEffectIcon(control.kind);
          return (
            <motion.div
              key={control.id}
              variants={controlVariants}
              initial="initial"
              animate="animate"
              exit="exit"
              transition={{ duration: 0.15, ease: 'easeOut' }}
              className="flex items-center gap-2"
            >
              {Icon && <Icon size={16} className="text-zinc-400 shrink-0" aria-hidden="true" />}
              <Slider
                id={control.id}
                label={control.label}
                value={control.value}
                min={control.min}
                max={control.max}
                step={control.step}
                onChange={(value) => handleChange(control.id, value)}
                disabled={disabled}
                debounceMs={debounceMs}
                defaultValue={getEffectDefinition(control.kind)?.defaultValue}
                formatValue={formatEffectValue}
              />
            </motion.div>
          );
        })}
      </AnimatePresence>
    </div>
  );
}
