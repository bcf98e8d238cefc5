// packages/core/src/testing/index.ts

export {
  createRecordingHttpClient,
  TestReply,
  type RecordedRequest,
  type RecordingHttpClientHandle,
} from "./http-client";
