import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ContactController } from './contact.controller';
import { Contact } from './contact.entity';
import { ContactService } from './contact.service';
import { UserModule } from '../user/user.module';
import { TokenAuthGuard } from '../user/auth.guard';

@Module({
    imports: [
        TypeOrmModule.forFeature([Contact]),
        UserModule,
    ],
    controllers: [ContactController],
    providers: [ContactService, TokenAuthGuard],
})
export class ContactModule { }
