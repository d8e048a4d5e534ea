/**
 * @file amplify/functions/text-to-speech/polly-client.ts
 * @description Amazon Polly client for synchronous text-to-speech synthesis
 */

import {
  type Engine,
  type OutputFormat,
  type PollyClient,
  SynthesizeSpeechCommand,
  TextType,
  type VoiceId,
} from '@aws-sdk/client-polly';

export interface SynthesisRequest {
  text: string;
  outputFormat: OutputFormat;
  voiceId: VoiceId;
  engine: Engine;
}

export interface SpeechSynthesizer {
  /** Resolves to undefined when Polly returns no audio payload */
  synthesize(request: SynthesisRequest): Promise<Uint8Array | undefined>;
}

export class PollySpeechSynthesizer implements SpeechSynthesizer {
  constructor(private readonly client: PollyClient) {}

  async synthesize(request: SynthesisRequest): Promise<Uint8Array | undefined> {
    console.log(
      `Calling Polly SynthesizeSpeech: ${request.text.length} chars, voice=${request.voiceId}, engine=${request.engine}`
    );

    // No chunking: text over Polly's request limit is rejected by the service
    const response = await this.client.send(
      new SynthesizeSpeechCommand({
        Text: request.text,
        TextType: TextType.TEXT,
        OutputFormat: request.outputFormat,
        VoiceId: request.voiceId,
        Engine: request.engine,
      })
    );

    const audio = await response.AudioStream?.transformToByteArray();
    if (!audio || audio.length === 0) {
      return undefined;
    }

    console.log(`Polly returned ${audio.length} bytes (${response.ContentType ?? 'unknown type'})`);
    return audio;
  }
}
