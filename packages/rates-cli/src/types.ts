export type ParsedArgs = {
  codes: string[];
  commonUrl?: string;
  otherUrl?: string;
  timeoutMs?: number;
  json: boolean;
};

export type FormatOptions = {
  json: boolean;
};
