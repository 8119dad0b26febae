export interface FirefliesAttendee {
  displayName?: string | null;
  email?: string | null;
  name?: string | null;
}

export interface FirefliesSentence {
  index: number;
  speaker_name?: string | null;
  text?: string | null;
  start_time?: number | string | null; // seconds; older accounts return strings
  end_time?: number | string | null;
}

// Fields beyond id are optional: the fallback queries select less.
export interface FirefliesTranscript {
  id: string;
  title?: string | null;
  date?: number | string | null;
  organizer_email?: string | null;
  host_email?: string | null;
  participants?: Array<string | { email?: string | null }> | null;
  fireflies_users?: Array<string | { email?: string | null }> | null;
  meeting_attendees?: FirefliesAttendee[] | null;
  sentences?: FirefliesSentence[] | null;
}

export interface TranscriptQueryResponse {
  transcript: FirefliesTranscript | null;
}

export interface FirefliesCredentials {
  apiKey?: string;
}

export interface FirefliesGraphQLError {
  message: string;
  extensions?: {
    code?: string;
  };
}
