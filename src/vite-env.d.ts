/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_GEMINI_API_KEY?: string;
  readonly VITE_GEMINI_MODEL?: string;
  readonly VITE_GEMINI_BASE_URL?: string;
  readonly VITE_USE_MOCK_LLM?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
