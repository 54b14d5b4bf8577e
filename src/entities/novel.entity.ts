import { Entity, Column, PrimaryColumn, CreateDateColumn } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';

export const NOVEL_STATUSES = ['ongoing', 'completed', 'announced'] as const;
export type NovelStatus = (typeof NOVEL_STATUSES)[number];

@Entity('novels')
export class Novel {
    @ApiProperty({ description: 'Novel ID', example: 'nvl_a1b2c3d4' })
    @PrimaryColumn({ type: 'varchar', length: 32 })
    id!: string;

    @ApiProperty({ description: 'Title (original)' })
    @Column({ type: 'text' })
    title!: string;

    @ApiProperty({ description: 'English title' })
    @Column({ type: 'text' })
    title_en!: string;

    @ApiProperty({ description: 'Author' })
    @Column({ type: 'text' })
    author!: string;

    @ApiProperty({ description: 'First publication year' })
    @Column({ type: 'int' })
    year_start!: number;

    @ApiProperty({ description: 'Last publication year', required: false, nullable: true })
    @Column({ type: 'int', nullable: true })
    year_end!: number | null;

    @ApiProperty({ description: 'Publication status', enum: NOVEL_STATUSES })
    @Column({ type: 'varchar', length: 16, default: 'ongoing' })
    status!: NovelStatus;

    @ApiProperty({ description: 'Synopsis', required: false, nullable: true })
    @Column({ type: 'text', nullable: true })
    description!: string | null;

    @ApiProperty({ description: 'Age rating', required: false, nullable: true })
    @Column({ type: 'varchar', length: 8, nullable: true })
    age_rating!: string | null;

    @ApiProperty({ description: 'Cover image URL', required: false, nullable: true })
    @Column({ type: 'text', nullable: true })
    cover_url!: string | null;

    // 由 chapters 表触发器维护
    @ApiProperty({ description: 'Number of chapters' })
    @Column({ type: 'int', default: 0, insert: false, update: false })
    chapters_count!: number;

    @ApiProperty({ description: 'Creation timestamp' })
    @CreateDateColumn({ type: 'timestamptz' })
    created_at!: Date;

    // 生成列，仅用于排序与检索
    @Column({ type: 'text', select: false, insert: false, update: false })
    title_norm?: string;

    @Column({ type: 'text', select: false, insert: false, update: false })
    title_en_norm?: string;

    @Column({ type: 'text', select: false, insert: false, update: false })
    author_norm?: string;
}
