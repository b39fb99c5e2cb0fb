export { OpenAIVisionDetector, openAIVisionCompletion, parseDetections, buildDetectorPrompt } from "./openai-detector";
export type { VisionCompletion } from "./openai-detector";
export { SerializedDetector, createDetectorProvider } from "./serialized-detector";
export type { DetectorMode, DetectorProvider } from "./serialized-detector";
