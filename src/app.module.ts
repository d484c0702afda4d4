import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User, Student, StudentDocument, ChatTurn } from './entities';
import { positiveIntSetting } from './utils/settings';
import { GeminiModule } from './logic/gemini/gemini.module';
import { AuthModule } from './logic/auth/auth.module';
import { ChatModule } from './logic/chat/chat.module';
import { StudentsModule } from './logic/students/students.module';
import { SpeechModule } from './logic/speech/speech.module';
import { AnalyticsModule } from './logic/analytics/analytics.module';
import { SocketGatewayModule } from './logic/socket-gateway/socket-gateway.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'mysql',
        host: configService.get<string>('DB_HOST', 'localhost'),
        port: positiveIntSetting(configService, 'DB_PORT', 3306),
        username: configService.get<string>('DB_USERNAME', 'root'),
        password: configService.get<string>('DB_PASSWORD', ''),
        database: configService.get<string>('DB_DATABASE', 'neurosync'),
        entities: [User, Student, StudentDocument, ChatTurn],
        synchronize: String(configService.get('DB_SYNCHRONIZE', configService.get('NODE_ENV') !== 'production')) === 'true',
        logging: configService.get('NODE_ENV') === 'development',
      }),
      inject: [ConfigService],
    }),
    GeminiModule,
    AuthModule,
    StudentsModule,
    ChatModule,
    SpeechModule,
    AnalyticsModule,
    SocketGatewayModule,
  ],
})
export class AppModule {}
