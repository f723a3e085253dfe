export type OutputFormat = "sql" | "json";

export type GenerateOptions = {
  schema: string;
  config?: string;
  format: OutputFormat;
  output?: string;
  seed?: string;
  dryRun?: boolean;
};

export type DescribeOptions = {
  schema: string;
  config?: string;
};
