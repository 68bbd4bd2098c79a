import { fireEvent, render, screen } from "@testing-library/react";
import App from "@/App";
import { MockLLMClient } from "@/shared/lib/llm/mock-client";
import type { LLMClient } from "@/shared/lib/llm/types";

/** Renders the whole app at "/" against the given client. */
export function renderApp(client: LLMClient = new MockLLMClient({ delayMs: 0 })) {
  window.history.replaceState(null, "", "/");
  return render(<App client={client} />);
}

export function imageFile(name = "harbor.png", type = "image/png"): File {
  return new File([new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])], name, { type });
}

/** Selects a file through the dropzone's hidden input. */
export function pickImage(file: File): void {
  const input = screen
    .getByTestId("image-dropzone")
    .querySelector<HTMLInputElement>('input[type="file"]');
  if (!input) throw new Error("image input not found");
  fireEvent.change(input, { target: { files: [file] } });
}

export function generateButton(): HTMLButtonElement {
  const button = screen.getByTestId("generate-btn");
  if (!(button instanceof HTMLButtonElement)) throw new Error("generate-btn is not a button");
  return button;
}
