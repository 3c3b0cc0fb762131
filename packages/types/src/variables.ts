/** Names of the variables the bootstrap reads at process start. */
export type VariableName = "HOST" | "PORT" | "USERNAME" | "PASSWORD" | "DATABASE" | "BUCKET";

/**
 * The configuration variables supplied by the container environment.
 * Every field is optional: nothing is validated before the server sees it.
 */
export type ConfigurationVariableSet = Readonly<Partial<Record<VariableName, string>>>;
