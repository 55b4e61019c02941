import { SttEngine } from "../enums/stt.engine";

export interface AudioSegment {
  path: string;
  startSec: number;
  endSec: number;
}

export interface SegmentTranscription {
  text: string;
  start: number;
  end: number;
  language: string;
  confidence: number;
}

export interface TranscriptionOutputFiles {
  txtPath: string;
  srtPath: string;
  jsonPath: string;
  txtUrl: string;
  srtUrl: string;
  jsonUrl: string;
}

export interface SegmentsTranscriptionResult {
  results: SegmentTranscription[];
  engineUsed: SttEngine;
  fallbackSegments: number;
}
