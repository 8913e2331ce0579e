import { createCatalogResolver } from "../adapters/memory/catalog-resolver"
import { defineClassifications } from "../core/classifications"

export const Kinds = defineClassifications([
  "not_found",
  "io_error",
  "config.load_failed",
  "permission_denied",
])

export type Kind = (typeof Kinds.ids)[number]

export const resolver = createCatalogResolver<Kind>({
  defaultLocale: "en-US",
  catalog: {
    "en-US": {
      not_found: "File {path} not found",
      io_error: "I/O failure on {path}",
      "config.load_failed": "Could not load configuration from {source}",
    },
    fr: {
      not_found: "Fichier {path} introuvable",
    },
  },
})
