export {
  IntermediateRepresentation,
  interpolation,
  type Interpolation,
  type InterpolationPair,
  type FormatValue,
  type Site,
} from "./ir";
