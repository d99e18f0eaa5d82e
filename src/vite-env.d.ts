/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_BASE_URL?: string
  readonly VITE_DEFAULT_HOURS?: string
  readonly VITE_INTERVAL_MINUTES?: string
  readonly VITE_DEMO_SEED?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
