/**
 * FileDropzone: drag-and-drop image picker with an inline preview.
 *
 * - Highlights while a file is dragged over it
 * - Click or Enter/Space opens the native file browser
 * - Shows a preview of the selected image with its file name and a remove button
 * - Calls onFileChange(file) when a file is picked or dropped, null when cleared
 *
 * Type filtering beyond the input's accept attribute is the caller's job: a
 * dropped file bypasses accept entirely.
 */

import { useCallback, useEffect, useRef, useState } from "react";
import type React from "react";
import { ImagePlus, X } from "lucide-react";
import { cn } from "@/shared/lib/utils";

export interface FileDropzoneProps {
  file: File | null;
  onFileChange: (file: File | null) => void;
  /** Passed to the file input's accept attribute, e.g. "image/jpeg,image/png". */
  accept?: string;
  /** Prompt shown when no file is selected. */
  label?: string;
  /** data-testid prefix; remove button gets "{testId}-remove" */
  testId?: string;
  disabled?: boolean;
}

/** Object URL for the selected file, revoked when the file changes. */
function usePreviewUrl(file: File | null): string | null {
  const [url, setUrl] = useState<string | null>(null);

  useEffect(() => {
    if (!file) {
      setUrl(null);
      return;
    }
    const next = URL.createObjectURL(file);
    setUrl(next);
    return () => URL.revokeObjectURL(next);
  }, [file]);

  return url;
}

export function FileDropzone({
  file,
  onFileChange,
  accept,
  label = "Drop an image here or click to browse",
  testId = "file-dropzone",
  disabled = false,
}: FileDropzoneProps) {
  const inputRef = useRef<HTMLInputElement>(null);
  const [isDraggingOver, setIsDraggingOver] = useState(false);
  const previewUrl = usePreviewUrl(file);

  const openBrowser = useCallback(() => {
    if (disabled) return;
    inputRef.current?.click();
  }, [disabled]);

  const handleKeyDown = useCallback(
    (e: React.KeyboardEvent) => {
      if (e.key === "Enter" || e.key === " ") {
        e.preventDefault();
        openBrowser();
      }
    },
    [openBrowser]
  );

  const handleInputChange = useCallback(
    (e: React.ChangeEvent<HTMLInputElement>) => {
      onFileChange(e.target.files?.[0] ?? null);
      // Reset so the same file can be re-selected after removal.
      e.target.value = "";
    },
    [onFileChange]
  );

  const handleDragOver = useCallback(
    (e: React.DragEvent<HTMLDivElement>) => {
      if (disabled) return;
      e.preventDefault();
      setIsDraggingOver(true);
    },
    [disabled]
  );

  const handleDragLeave = useCallback((e: React.DragEvent<HTMLDivElement>) => {
    const next = e.relatedTarget;
    // Only clear when leaving the dropzone entirely (not entering a child).
    if (!(next instanceof Node) || !e.currentTarget.contains(next)) {
      setIsDraggingOver(false);
    }
  }, []);

  const handleDrop = useCallback(
    (e: React.DragEvent<HTMLDivElement>) => {
      e.preventDefault();
      setIsDraggingOver(false);
      if (disabled) return;
      const dropped = e.dataTransfer.files?.[0];
      if (dropped) onFileChange(dropped);
    },
    [disabled, onFileChange]
  );

  const handleRemove = useCallback(
    (e: React.MouseEvent) => {
      e.stopPropagation();
      onFileChange(null);
    },
    [onFileChange]
  );

  return (
    <div
      role="button"
      tabIndex={disabled ? -1 : 0}
      aria-label={file ? `Selected image: ${file.name}. Press to change.` : label}
      aria-disabled={disabled}
      data-testid={testId}
      onClick={openBrowser}
      onKeyDown={handleKeyDown}
      onDragOver={handleDragOver}
      onDragLeave={handleDragLeave}
      onDrop={handleDrop}
      className={cn(
        "relative flex flex-col items-center justify-center gap-2 rounded-lg border-2 p-4 text-sm transition-all cursor-pointer select-none min-h-[160px]",
        isDraggingOver
          ? "border-primary bg-primary/10 text-primary"
          : file
          ? "border-border bg-muted/40"
          : "border-dashed border-muted-foreground/40 text-muted-foreground hover:border-muted-foreground/70 hover:text-foreground",
        disabled && "opacity-50 pointer-events-none"
      )}
    >
      <input
        ref={inputRef}
        type="file"
        accept={accept}
        onChange={handleInputChange}
        className="sr-only"
        tabIndex={-1}
        aria-hidden="true"
      />

      {file && previewUrl ? (
        <>
          <img
            src={previewUrl}
            alt="Uploaded image"
            className="max-h-64 w-auto rounded-md object-contain"
          />
          <div className="flex items-center gap-1.5 text-xs text-foreground">
            <span className="truncate max-w-[240px]">{file.name}</span>
            <button
              type="button"
              aria-label="Remove image"
              data-testid={`${testId}-remove`}
              onClick={handleRemove}
              className="rounded-full p-0.5 hover:bg-muted-foreground/20 transition-colors"
            >
              <X className="h-3 w-3" aria-hidden="true" />
            </button>
          </div>
        </>
      ) : (
        <>
          <ImagePlus className="h-6 w-6" aria-hidden="true" />
          <span>{label}</span>
          <span className="text-xs text-muted-foreground">JPG, JPEG or PNG</span>
        </>
      )}
    </div>
  );
}
