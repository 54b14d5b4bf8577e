import { Entity, Column, PrimaryColumn } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';

@Entity('sources')
export class Source {
    @PrimaryColumn({ type: 'varchar', length: 32 })
    id!: string;

    @ApiProperty({ description: 'Translation team / source name' })
    @Column({ type: 'text', unique: true })
    name!: string;

    @ApiProperty({ description: 'Logo URL', required: false, nullable: true })
    @Column({ type: 'text', nullable: true })
    logo_url!: string | null;
}
