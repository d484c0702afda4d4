import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { ConfiguredIoAdapter } from './configured-io.adapter';

describe('ConfiguredIoAdapter', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const module = await Test.createTestingModule({}).compile();
    app = module.createNestApplication();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await app.close();
  });

  it('creates the socket server with the configured CORS origin', () => {
    const create = jest.spyOn(IoAdapter.prototype, 'createIOServer').mockReturnValue({});

    new ConfiguredIoAdapter(app, 'https://app.example.test').createIOServer(0);

    expect(create).toHaveBeenCalledWith(0, { cors: { origin: 'https://app.example.test', credentials: true } });
  });
});
