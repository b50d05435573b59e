// ===========================================================================
// Timeline Types
//
// One Timeline per render, owned by that render only. Narration segments
// are contiguous and in document order; SFX placements are overlays that
// never move the clock.
// ===========================================================================

/** A narration or silence segment on the narration bed. */
export interface NarrationSegment {
  kind: 'speech' | 'silence';
  /** Audio file in the render's working directory */
  filePath: string;
  /** Absolute start in seconds */
  startTime: number;
  /** Absolute end in seconds (== next segment's startTime) */
  endTime: number;
  /** Set for speech segments */
  speaker?: string;
}

/** A sound effect resolved to a file and an absolute start time (>= 0). */
export interface SfxPlacement {
  assetId: string;
  filePath: string;
  startTime: number;
}

/** Looped beds selected by the @music / @ambience directives. */
export interface BackgroundBeds {
  music?: string;
  ambience?: string;
}

export interface Timeline {
  /** Value of @title, or the fallback title */
  title: string;
  segments: NarrationSegment[];
  sfx: SfxPlacement[];
  beds: BackgroundBeds;
  /** Final clock position: the narration bed's length */
  totalDuration: number;
}
