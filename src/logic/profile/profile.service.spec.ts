import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PLACEHOLDER_PROFILE, ProfileService } from './profile.service';
import { GeminiService } from '../gemini/gemini.service';
import { FakeGeminiService } from '../../testing/fake-gemini.service';

describe('ProfileService', () => {
  let service: ProfileService;
  let gemini: FakeGeminiService;

  const buildService = async (config: Record<string, unknown>): Promise<ProfileService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ProfileService,
        { provide: GeminiService, useValue: gemini },
        { provide: ConfigService, useValue: new ConfigService(config) },
      ],
    }).compile();
    return module.get<ProfileService>(ProfileService);
  };

  beforeEach(async () => {
    gemini = new FakeGeminiService();
    service = await buildService({ PROFILE_CONTEXT_CHARS: 30 });
  });

  it('parses a fenced JSON reply', async () => {
    gemini.queue('```json\n{"name": "Jordan Lee", "diagnosis": "Dyslexia", "grade": "4", "iep_date": "2025-03-14"}\n```');

    await expect(service.extractProfile('record text')).resolves.toEqual({
      name: 'Jordan Lee',
      diagnosis: 'Dyslexia',
      grade: '4',
      iepDate: '2025-03-14',
    });
  });

  it('sends only the configured prefix of the record', async () => {
    gemini.queue('{}');
    await service.extractProfile(`${'r'.repeat(30)}SECRET-TAIL`);

    expect(gemini.calls[0].prompt).toContain('r'.repeat(30));
    expect(gemini.calls[0].prompt).not.toContain('SECRET-TAIL');
  });

  it('keeps the default budget when the configured one is malformed', async () => {
    const fallbackService = await buildService({ PROFILE_CONTEXT_CHARS: 'lots' });
    gemini.queue('{"name": "Sam"}');

    await fallbackService.extractProfile('Student: Sam Ortiz');

    expect(gemini.calls[0].prompt).toContain('Student: Sam Ortiz');
  });

  it('returns the placeholder record for malformed JSON', async () => {
    gemini.queue('Name: Jordan, Diagnosis: Dyslexia');
    await expect(service.extractProfile('record')).resolves.toEqual({
      name: 'Unknown',
      diagnosis: 'Not Found',
      grade: 'N/A',
      iepDate: 'N/A',
    });
  });

  it('returns the placeholder record when the call fails', async () => {
    gemini.queue(new Error('timeout'));
    await expect(service.extractProfile('record')).resolves.toEqual(PLACEHOLDER_PROFILE);
  });

  it('returns the placeholder record when the reply is not an object', async () => {
    gemini.queue('["Jordan"]');
    await expect(service.extractProfile('record')).resolves.toEqual(PLACEHOLDER_PROFILE);
  });

  it('fills missing or mistyped fields individually', async () => {
    gemini.queue('{"name": "Sam", "grade": 7, "iep_date": null}');
    await expect(service.extractProfile('record')).resolves.toEqual({
      name: 'Sam',
      diagnosis: 'Not Found',
      grade: '7',
      iepDate: 'N/A',
    });
  });
});
