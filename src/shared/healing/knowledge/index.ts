export {
	InMemoryKnowledgeStore,
	MAX_ERROR_PATTERN_CHARS,
	SqliteKnowledgeStore,
	deriveErrorPattern,
	matchErrorSolution,
	type KnowledgeStore,
} from "./KnowledgeStore"
