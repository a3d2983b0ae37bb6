import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import configuration from '../config/configuration';
import { EnvironmentConfigFactory } from '../config/environment.config';
import { BookingModule } from './booking';
import { LoggerModule } from './logging';
import { AppController } from './app.controller';

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
            load: [configuration],
            envFilePath: [`.env.${process.env.NODE_ENV || 'development'}`, '.env.local', '.env'],
            expandVariables: true,
        }),
        LoggerModule,
        BookingModule,
    ],
    controllers: [AppController],
    providers: [
        {
            provide: 'ENVIRONMENT_CONFIG',
            useFactory: (configService: ConfigService) => EnvironmentConfigFactory.create(configService),
            inject: [ConfigService],
        },
    ],
})
export class AppModule {}
