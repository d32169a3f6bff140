import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity()
export class RevokedToken {
  @PrimaryColumn()
  jti!: string;

  @Column()
  identityId!: number;

  // natural expiry of the token; the row is purged after this
  @Index()
  @Column()
  expiresAt!: Date;

  @CreateDateColumn()
  revokedAt!: Date;
}
