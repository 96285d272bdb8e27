import { ImageOff } from 'lucide-react';

export interface PreviewPanesProps {
  /** Data URL of the unedited preview */
  previewBase: string | null;
  /** Data URL of the pipeline output */
  output: string | null;
}

function Pane({ id, src, alt }: { id: string; src: string | null; alt: string }) {
  if (!src) {
    return (
      <div
        className="w-[200px] h-[150px] flex items-center justify-center rounded-md border border-dashed border-white/10"
        data-testid={`${id}-empty`}
      >
        <ImageOff size={20} className="text-zinc-600" aria-hidden="true" />
      </div>
    );
  }
  return <img id={id} src={src} alt={alt} className="rounded-md" />;
}

/**
 * Side-by-side unedited preview and edited output
 */
export default function PreviewPanes({ previewBase, output }: PreviewPanesProps) {
  return (
    <div className="flex gap-4">
      <Pane id="previewImg" src={previewBase} alt="Original preview" />
      <Pane id="targetImg" src={output} alt="Edited preview" />
    </div>
  );
}
