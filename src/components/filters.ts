import { FilterModule } from "./types";

const NUMBER = String.raw`[-]?[\d]+`;
const COLOR = String.raw`[#\w]+`;

/** Filters shipped with the service. */
export const BUILTIN_FILTERS: Record<string, FilterModule> = {
  "imagery.filters.quality": {
    name: "quality",
    parameters: new RegExp(`^(${NUMBER})$`),
  },
  "imagery.filters.format": {
    name: "format",
    parameters: /^(webp|jpeg|jpg|png|gif|avif)$/i,
  },
  "imagery.filters.grayscale": {
    name: "grayscale",
    parameters: /^$/,
  },
  "imagery.filters.rotate": {
    name: "rotate",
    parameters: new RegExp(`^(${NUMBER})$`),
  },
  "imagery.filters.fill": {
    name: "fill",
    parameters: new RegExp(`^(${COLOR})(?:,(true|false))?$`),
  },
  "imagery.filters.blur": {
    name: "blur",
    parameters: new RegExp(`^(${NUMBER})(?:,(${NUMBER}))?$`),
  },
};

export const DEFAULT_FILTERS: readonly string[] = Object.keys(BUILTIN_FILTERS);
