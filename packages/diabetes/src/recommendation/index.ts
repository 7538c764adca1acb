export {
  cleanRecommendation,
  parseRecommendation,
  type Recommendation,
  type RecommendationSections,
} from "./parse.js";
