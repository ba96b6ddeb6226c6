// =============================================================================
// AI Model Configuration
// =============================================================================

/**
 * Model used when neither the environment nor the caller names one
 */
export const DEFAULT_AGENT_MODEL = 'openai:gpt-4o-mini';

/**
 * Instructions given to every agent unless `AGENT_SYSTEM_PROMPT` overrides them
 */
export const DEFAULT_SYSTEM_PROMPT = [
  'You are an agent that completes tasks by running code and calling tools.',
  'Use execute_code to run code. Each call runs in a fresh process; files written to the working directory persist.',
  'Use reset_execution when the execution session is in a bad state.',
  'When a sub-task can be done independently, delegate it with subagent_task if that tool is available.',
  'When the task is done, answer the user directly without calling any tool.',
].join('\n');

/**
 * Turn budget of a delegated sub-task when the model does not pass `max_turns`
 */
export const DEFAULT_SUBAGENT_MAX_TURNS = 10;
