import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ContactNotFoundError, DuplicateContactError, isUniqueViolation } from '../core/errors';
import { User } from '../user/user.entity';
import { CreateContactInput, UpdateContactInput } from './contact.dto';
import { Contact } from './contact.entity';

@Injectable()
export class ContactService {
    constructor(
        @InjectRepository(Contact)
        private readonly contactRepository: Repository<Contact>,
    ) { }

    async findAll(owner: User): Promise<Contact[]> {
        return this.contactRepository.find({
            where: { ownerId: owner.id },
            order: { createdAt: 'DESC', id: 'DESC' },
        });
    }

    // Contacts of other owners are reported as missing, not forbidden.
    async findOne(owner: User, id: number): Promise<Contact> {
        const contact = await this.contactRepository.findOne({
            where: { id, ownerId: owner.id },
        });
        if (!contact) {
            throw new ContactNotFoundError(id);
        }
        return contact;
    }

    async create(owner: User, input: CreateContactInput): Promise<Contact> {
        const contact = this.contactRepository.create({ ...input, ownerId: owner.id });
        try {
            return await this.contactRepository.save(contact);
        } catch (error) {
            if (isUniqueViolation(error)) throw new DuplicateContactError(input.email);
            throw error;
        }
    }

    async update(owner: User, id: number, changes: UpdateContactInput): Promise<Contact> {
        const contact = await this.findOne(owner, id);
        if (changes.firstName !== undefined) contact.firstName = changes.firstName;
        if (changes.lastName !== undefined) contact.lastName = changes.lastName;
        if (changes.email !== undefined) contact.email = changes.email;
        try {
            return await this.contactRepository.save(contact);
        } catch (error) {
            if (isUniqueViolation(error)) throw new DuplicateContactError(contact.email);
            throw error;
        }
    }

    async remove(owner: User, id: number): Promise<void> {
        const contact = await this.findOne(owner, id);
        await this.contactRepository.remove(contact);
    }
}
