/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_WB_BASE_URL?: string
  readonly VITE_WB_DATA_YEAR?: string
  readonly VITE_WB_PER_PAGE?: string
  readonly VITE_GEOCODER_URL?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
