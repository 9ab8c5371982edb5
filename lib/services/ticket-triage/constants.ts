/**
 * Ticket Triage Constants
 */

/** Node names reported in node_start / node_complete events */
export const NODE_SEARCH_KB = "search_kb";
export const NODE_ANALYZE = "analyze";
export const NODE_CLASSIFY = "classify";

/** next_action used when classification could not be obtained from the model */
export const MANUAL_REVIEW_ACTION = "Manual review required";

/** Severity assumed when the model could not classify the ticket */
export const FALLBACK_SEVERITY = "Medium";

/** Category assumed when the model could not classify the ticket */
export const FALLBACK_CATEGORY = "Question/How-To";

/** Longest summary copied from the description into a fallback classification */
export const FALLBACK_SUMMARY_LENGTH = 200;

export const STATUS_STARTED = "Triage started";
export const STATUS_RESUMED = "Resuming triage";
export const STATUS_COMPLETE = "Triage complete";

export const NO_MATCHES_SUMMARY = "No matching known issues found in the knowledge base.";

export const CLASSIFY_TOOL_NAME = "classify_ticket";
export const ASSESS_TOOL_NAME = "assess_ticket_detail";

/** Upper bound on knowledge-base matches carried by a ticket */
export const MAX_KB_MATCHES = 3;
