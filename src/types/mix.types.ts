// ===========================================================================
// Mix Graph Types
//
// A compiled mix graph is a plain value describing the single mixing
// invocation: ordered inputs, the filter chains, and the output encoding.
// ===========================================================================

export interface MixOutputSpec {
  /** Sanitized title + extension; the directory is chosen by the caller */
  fileName: string;
  format: 'mp3';
  codec: 'libmp3lame';
  bitrate: string;
}

export interface MixGraph {
  /** Input files; index N is addressed as [N:a] in the filters */
  inputs: string[];
  /** Filter chains, joined with ';' into one filter_complex */
  filters: string[];
  /** Label of the summed stream that is mapped to the output */
  outputLabel: string;
  output: MixOutputSpec;
  /** Narration bed length the beds are trimmed to */
  durationSeconds: number;
}
