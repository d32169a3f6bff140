import {
    Body,
    Controller,
    Delete,
    Get,
    HttpCode,
    HttpStatus,
    Param,
    Patch,
    Post,
    UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ZodValidationPipe } from '../core/zod-validation.pipe';
import { TokenAuthGuard } from '../user/auth.guard';
import { CurrentUser } from '../user/current-user.decorator';
import { User } from '../user/user.entity';
import {
    contactIdSchema,
    CreateContactDto,
    createContactSchema,
    UpdateContactDto,
    updateContactSchema,
} from './contact.dto';
import { Contact } from './contact.entity';
import { ContactService } from './contact.service';

@ApiTags('Contact')
@ApiBearerAuth()
@UseGuards(TokenAuthGuard)
@Controller('contacts')
export class ContactController {
    constructor(private readonly contactService: ContactService) { }

    @Get()
    @ApiOperation({ summary: 'List contacts', description: 'Contacts of the current user, newest first.' })
    async findAll(@CurrentUser() user: User): Promise<Contact[]> {
        return this.contactService.findAll(user);
    }

    @Post()
    @ApiOperation({ summary: 'Create contact' })
    @ApiResponse({ status: 201, description: 'Contact created' })
    @ApiResponse({ status: 409, description: 'A contact with this email already exists' })
    async create(
        @CurrentUser() user: User,
        @Body(new ZodValidationPipe(createContactSchema)) dto: CreateContactDto,
    ): Promise<Contact> {
        return this.contactService.create(user, dto);
    }

    @Get(':id')
    @ApiOperation({ summary: 'Get contact' })
    @ApiResponse({ status: 404, description: 'Contact not found' })
    async findOne(
        @CurrentUser() user: User,
        @Param('id', new ZodValidationPipe(contactIdSchema)) id: number,
    ): Promise<Contact> {
        return this.contactService.findOne(user, id);
    }

    @Patch(':id')
    @ApiOperation({ summary: 'Update contact' })
    @ApiResponse({ status: 404, description: 'Contact not found' })
    async update(
        @CurrentUser() user: User,
        @Param('id', new ZodValidationPipe(contactIdSchema)) id: number,
        @Body(new ZodValidationPipe(updateContactSchema)) dto: UpdateContactDto,
    ): Promise<Contact> {
        return this.contactService.update(user, id, dto);
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    @ApiOperation({ summary: 'Delete contact' })
    @ApiResponse({ status: 404, description: 'Contact not found' })
    async remove(
        @CurrentUser() user: User,
        @Param('id', new ZodValidationPipe(contactIdSchema)) id: number,
    ): Promise<void> {
        await this.contactService.remove(user, id);
    }
}
