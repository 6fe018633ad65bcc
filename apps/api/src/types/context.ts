/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  /** Resolved caller identity; null when the resolver could not name one */
  userId: string | null;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
