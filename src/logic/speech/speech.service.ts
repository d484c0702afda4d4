import { SpeechClient } from '@google-cloud/speech';
import type { protos } from '@google-cloud/speech';
import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

type AudioEncoding = keyof typeof protos.google.cloud.speech.v1.RecognitionConfig.AudioEncoding;

export interface AudioUpload {
    originalname: string;
    mimetype: string;
    buffer: Buffer;
}

const ENCODINGS: Record<string, AudioEncoding> = {
    'audio/webm': 'WEBM_OPUS',
    'audio/ogg': 'OGG_OPUS',
    'audio/wav': 'LINEAR16',
    'audio/x-wav': 'LINEAR16',
    'audio/wave': 'LINEAR16',
    'audio/flac': 'FLAC',
    'audio/mpeg': 'MP3',
    'audio/mp3': 'MP3',
};

/** Server side of the spoken-input widget: audio in, plain text out. */
@Injectable()
export class SpeechService {
    private readonly logger = new Logger(SpeechService.name);
    private readonly client: SpeechClient;
    private readonly languageCode: string;

    constructor(private readonly configService: ConfigService) {
        const keyFilename = this.configService.get<string>('SPEECH_KEY_FILE');
        this.client = new SpeechClient(keyFilename ? { keyFilename } : {});
        this.languageCode = this.configService.get<string>('SPEECH_LANGUAGE_CODE', 'en-US');
    }

    isAudioFile(mimeType: string): boolean {
        return mimeType.startsWith('audio/');
    }

    encodingFor(mimeType: string): AudioEncoding | undefined {
        // strip codec parameters, e.g. "audio/webm;codecs=opus"
        return ENCODINGS[mimeType.split(';')[0].trim().toLowerCase()];
    }

    async transcribe(file: AudioUpload | undefined): Promise<{ text: string }> {
        if (!file) {
            throw new BadRequestException('No audio uploaded');
        }
        if (!this.isAudioFile(file.mimetype)) {
            throw new BadRequestException(`File ${file.originalname} is not an audio file`);
        }

        const [response] = await this.client.recognize({
            config: {
                encoding: this.encodingFor(file.mimetype),
                languageCode: this.languageCode,
                enableAutomaticPunctuation: true,
            },
            audio: { content: file.buffer.toString('base64') },
        });

        const text = (response.results ?? [])
            .map(result => result.alternatives?.[0]?.transcript ?? '')
            .filter(Boolean)
            .join('\n');
        this.logger.log(`Transcribed ${file.originalname}: ${text.length} characters`);
        return { text };
    }
}
