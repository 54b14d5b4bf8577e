import {
    Entity,
    Column,
    PrimaryColumn,
    ManyToOne,
    JoinColumn,
    CreateDateColumn,
    Unique,
} from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { Novel } from './novel.entity';
import { Source } from './source.entity';

@Entity('chapters')
@Unique(['novel_id', 'chapter_num'])
export class Chapter {
    @ApiProperty({ description: 'Chapter ID', example: 'chp_a1b2c3d4' })
    @PrimaryColumn({ type: 'varchar', length: 32 })
    id!: string;

    @ApiProperty({ description: 'Owning novel ID' })
    @Column({ type: 'varchar', length: 32 })
    novel_id!: string;

    @ManyToOne(() => Novel, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'novel_id' })
    novel?: Novel;

    @ApiProperty({ description: 'Chapter number within the novel' })
    @Column({ type: 'int' })
    chapter_num!: number;

    @ApiProperty({ description: 'Chapter title' })
    @Column({ type: 'text' })
    title!: string;

    @ApiProperty({ description: 'English chapter title', required: false, nullable: true })
    @Column({ type: 'text', nullable: true })
    title_en!: string | null;

    @ApiProperty({ description: 'Chapter body' })
    @Column({ type: 'text' })
    content!: string;

    @Column({ type: 'varchar', length: 32, nullable: true })
    source_id!: string | null;

    @ApiProperty({ description: 'Translation source', type: () => Source, required: false, nullable: true })
    @ManyToOne(() => Source, { onDelete: 'SET NULL', nullable: true })
    @JoinColumn({ name: 'source_id' })
    source?: Source | null;

    @ApiProperty({ description: 'Creation timestamp' })
    @CreateDateColumn({ type: 'timestamptz' })
    created_at!: Date;
}
