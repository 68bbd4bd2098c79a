import { contentTypeLabel } from "@/story/lib/prompts";
import type { GenerationResult } from "@/story/lib/types";

/** The two texts of one generation, as shown right after it completes. */
export function ResultPanel({ result }: { result: GenerationResult }) {
  return (
    <section className="flex flex-col gap-6" data-testid="result-panel">
      <div>
        <h2 className="text-lg font-semibold mb-2">Extracted image description</h2>
        <p className="whitespace-pre-line text-sm leading-relaxed" data-testid="result-description">
          {result.imageDescription}
        </p>
      </div>
      <div>
        <h2 className="text-lg font-semibold mb-2">Generated {contentTypeLabel(result.contentType)}</h2>
        <p className="whitespace-pre-line text-sm leading-relaxed" data-testid="result-text">
          {result.generatedText}
        </p>
      </div>
    </section>
  );
}
