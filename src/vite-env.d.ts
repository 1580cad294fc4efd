/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_MAX_PASSAGES?: string
    readonly VITE_SAFETY_FACTOR?: string
    readonly VITE_MAX_INITIAL_VESSELS?: string
    readonly VITE_FIRST_PASSAGE_DAYS?: string
    readonly VITE_SUBSEQUENT_PASSAGE_DAYS?: string
    readonly VITE_PRIMING_FRACTION?: string
    readonly VITE_COLLECTION_FLOOR_ML?: string
}

interface ImportMeta {
    readonly env: ImportMetaEnv
}
