export { PatchApplicationError, PatchApplicator, type PatchPlanCheck, type PlannedWrite } from "./PatchApplicator"
export { SqliteProposalRegistry, type ProposalRegistry, type SqliteProposalRegistryOptions } from "./ProposalRegistry"
