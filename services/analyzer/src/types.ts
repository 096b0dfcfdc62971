export type RecordId = string;

export interface StringProperties {
  length: number;
  is_palindrome: boolean;
  unique_characters: number;
  word_count: number;
  sha256_hash: string;
  character_frequency_map: Record<string, number>;
}

export interface StringRecord {
  id: RecordId;      // always the sha256 of value
  value: string;
  properties: StringProperties;
  created_at: string;
  updated_at: string;
  version: number;
}

/** Optional predicates over a record's properties; absent fields do not constrain. */
export interface FilterSpec {
  is_palindrome?: boolean;
  min_length?: number;
  max_length?: number;
  word_count?: number;
  contains_character?: string;
}

export type FilterField = keyof FilterSpec;

export interface RuleMatch {
  rule: string;
  field: FilterField;
  value: FilterSpec[FilterField];
  phrase: string;
  applied: boolean;
}

export interface ParsedQuery {
  data: StringRecord[];
  count: number;
  interpreted_query: {
    original: string;
    parsed_filters: FilterSpec;
    matched_rules: RuleMatch[];
  };
}
