/**
 * Agents - Main Index
 *
 * Entry point for the pipeline agents, their data model and error taxonomy.
 */

// ============================================================================
// CORE TYPES AND ERRORS
// ============================================================================

export * from "./types";
export * from "./errors";
export * from "./schemas";

// ============================================================================
// AGENT CORE COMPONENTS
// ============================================================================

export { Agent, AGENT_VERSION, type AgentContext } from "./agent-core";

// ============================================================================
// AGENT IMPLEMENTATIONS
// ============================================================================

export { TermExtractionAgent, detectLanguage, summarizeByCategory } from "./term-extraction-agent";
export { TermSelectionAgent, DEFAULT_CONFIDENCE_THRESHOLD } from "./term-selection-agent";
