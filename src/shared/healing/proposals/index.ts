export { ConfidenceScorer, scoreConfidence, type ConfidenceInput, type ProposalScore } from "./ConfidenceScorer"
export { PatchProposer, buildPatchPrompt, type ProposePatchInput } from "./PatchProposer"
