/**
 * Generator page.
 *
 * Route: /
 *
 * Collects an image, a free-text prompt and the tone/length/type options,
 * then runs submitGeneration against the current session. While the two
 * provider calls are in flight the Generate button is disabled and shows the
 * elapsed seconds. On success the description and the generated text are
 * shown below the form and the result is already in the session history.
 *
 * Failures never leave the page unusable:
 *   MissingInputError → amber inline warning (no image, unsupported file)
 *   ProviderError     → red inline error with the provider's reason
 */

import { useCallback, useEffect, useRef, useState, type FormEvent } from "react";
import { Link } from "react-router-dom";
import { AlertTriangle, History, Sparkles, XCircle } from "lucide-react";
import { Button } from "@/shared/components/ui/button";
import { Textarea } from "@/shared/components/ui/textarea";
import { FileDropzone } from "@/shared/components/FileDropzone";
import { useElapsedTimer } from "@/shared/hooks/useElapsedTimer";
import { log } from "@/shared/lib/actionLog";
import { MissingInputError, ProviderError, errorMessage } from "@/shared/lib/errors";
import { OptionSelect } from "@/story/components/OptionSelect";
import { ResultPanel } from "@/story/components/ResultPanel";
import { useHistory, useSession } from "@/story/context/SessionContext";
import { submitGeneration } from "@/story/lib/generation";
import { IMAGE_ACCEPT, readImageFile } from "@/story/lib/image";
import { DEFAULT_OPTIONS, normalizeOptions } from "@/story/lib/prompts";
import {
  CONTENT_TYPES,
  LENGTHS,
  TONES,
  type GenerationOptions,
  type GenerationResult,
} from "@/story/lib/types";

type Notice = { variant: "warning" | "error"; message: string };

const PROMPT_PLACEHOLDER =
  "Example: Write a short story about a person returning home after a long journey.";

export default function Generator() {
  const session = useSession();
  const history = useHistory();
  const [file, setFile] = useState<File | null>(null);
  const [prompt, setPrompt] = useState("");
  const [options, setOptions] = useState<GenerationOptions>(DEFAULT_OPTIONS);
  const [isGenerating, setIsGenerating] = useState(false);
  const [notice, setNotice] = useState<Notice | null>(null);
  const [latest, setLatest] = useState<GenerationResult | null>(null);
  const elapsed = useElapsedTimer(isGenerating);

  // Prevents state updates after unmount (user navigates away mid-generation).
  const isMounted = useRef(true);
  useEffect(() => {
    isMounted.current = true;
    return () => {
      isMounted.current = false;
    };
  }, []);

  const handleFileChange = useCallback((next: File | null) => {
    setFile(next);
    setNotice(null);
  }, []);

  const handleGenerate = useCallback(async () => {
    if (isGenerating) return;

    setIsGenerating(true);
    setNotice(null);
    log({
      category: "user:action",
      action: "story:generate:start",
      data: { sessionId: session.id, hasImage: file !== null, ...options },
    });

    try {
      const image = file ? await readImageFile(file) : null;
      const result = await submitGeneration(session, { image, prompt, ...options });
      if (isMounted.current) setLatest(result);
    } catch (err) {
      let next: Notice;
      if (err instanceof MissingInputError) {
        next = { variant: "warning", message: err.message };
      } else if (err instanceof ProviderError) {
        next = { variant: "error", message: err.message };
      } else {
        next = { variant: "error", message: errorMessage(err) };
      }
      log({
        category: "error",
        action: "story:generate:error",
        data: {
          sessionId: session.id,
          error: next.message,
          ...(err instanceof ProviderError ? { kind: err.kind } : {}),
        },
      });
      if (isMounted.current) setNotice(next);
    } finally {
      if (isMounted.current) setIsGenerating(false);
    }
  }, [isGenerating, session, file, prompt, options]);

  function handleSubmit(e: FormEvent) {
    e.preventDefault();
    void handleGenerate();
  }

  return (
    <div className="mx-auto w-full max-w-3xl p-4 md:p-8 flex flex-col gap-8">
      <div>
        <h1 className="text-2xl font-bold tracking-tight">Image to Text and Story Generator</h1>
        <p className="mt-1 text-muted-foreground text-sm">
          Upload an image, get a detailed description, then generate a story or blog inspired by it.
        </p>
      </div>

      <form onSubmit={handleSubmit} className="flex flex-col gap-4" aria-label="Generation request">
        <FileDropzone
          file={file}
          onFileChange={handleFileChange}
          accept={IMAGE_ACCEPT}
          label="Upload an image (jpg, jpeg, png)"
          testId="image-dropzone"
          disabled={isGenerating}
        />

        <div className="flex flex-col gap-1.5">
          <label
            htmlFor="prompt"
            className="text-xs font-medium text-muted-foreground uppercase tracking-wider"
          >
            What do you want to generate from this image?
          </label>
          <Textarea
            id="prompt"
            value={prompt}
            onChange={(e) => setPrompt(e.target.value)}
            placeholder={PROMPT_PLACEHOLDER}
            className="resize-none min-h-[100px]"
            disabled={isGenerating}
          />
        </div>

        <div className="grid grid-cols-1 sm:grid-cols-3 gap-3">
          <OptionSelect
            id="tone"
            label="Tone"
            value={options.tone}
            options={TONES}
            onChange={(tone) => setOptions((prev) => normalizeOptions({ ...prev, tone }))}
            disabled={isGenerating}
          />
          <OptionSelect
            id="length"
            label="Length"
            value={options.length}
            options={LENGTHS}
            onChange={(length) => setOptions((prev) => normalizeOptions({ ...prev, length }))}
            disabled={isGenerating}
          />
          <OptionSelect
            id="content-type"
            label="Type"
            value={options.contentType}
            options={CONTENT_TYPES}
            onChange={(contentType) =>
              setOptions((prev) => normalizeOptions({ ...prev, contentType }))
            }
            disabled={isGenerating}
          />
        </div>

        <div className="flex items-center justify-between gap-3">
          {history.length > 0 ? (
            <Link
              to="/history"
              className="inline-flex items-center gap-1.5 text-xs text-primary hover:underline underline-offset-2"
              data-testid="history-link"
            >
              <History className="h-3.5 w-3.5" aria-hidden="true" />
              {history.length} {history.length === 1 ? "result" : "results"} this session
            </Link>
          ) : (
            <span />
          )}
          <Button type="submit" isLoading={isGenerating} data-testid="generate-btn">
            {isGenerating ? (
              `Generating… ${elapsed}s`
            ) : (
              <>
                <Sparkles className="h-4 w-4" aria-hidden="true" />
                Generate
              </>
            )}
          </Button>
        </div>
      </form>

      {notice && (
        <div
          role="alert"
          data-testid={`notice-${notice.variant}`}
          className={
            notice.variant === "warning"
              ? "flex items-start gap-2 rounded-md border border-amber-300 bg-amber-50 px-4 py-3 text-sm text-amber-900"
              : "flex items-start gap-2 rounded-md border border-destructive/30 bg-destructive/10 px-4 py-3 text-sm text-destructive"
          }
        >
          {notice.variant === "warning" ? (
            <AlertTriangle className="h-4 w-4 shrink-0 mt-0.5" aria-hidden="true" />
          ) : (
            <XCircle className="h-4 w-4 shrink-0 mt-0.5" aria-hidden="true" />
          )}
          <span>{notice.message}</span>
        </div>
      )}

      {latest && <ResultPanel result={latest} />}
    </div>
  );
}
