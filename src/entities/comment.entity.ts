import {
    Entity,
    Column,
    PrimaryColumn,
    ManyToOne,
    JoinColumn,
    CreateDateColumn,
    Index,
} from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { Chapter } from './chapter.entity';
import { Profile } from './profile.entity';

export const COMMENT_STATUSES = ['pending', 'approved', 'rejected'] as const;
export type CommentStatus = (typeof COMMENT_STATUSES)[number];

@Entity('comments')
@Index('idx_comments_chapter_status_created', ['chapter_id', 'status', 'created_at'])
export class Comment {
    @ApiProperty({ description: 'Comment ID', example: 'cmt_a1b2c3d4' })
    @PrimaryColumn({ type: 'varchar', length: 32 })
    id!: string;

    @ApiProperty({ description: 'Chapter ID' })
    @Column({ type: 'varchar', length: 32 })
    chapter_id!: string;

    @ManyToOne(() => Chapter, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'chapter_id' })
    chapter?: Chapter;

    @ApiProperty({ description: 'Author profile ID' })
    @Column({ type: 'varchar', length: 32 })
    user_id!: string;

    @ManyToOne(() => Profile, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'user_id' })
    author?: Profile;

    @ApiProperty({ description: 'Sanitized HTML body' })
    @Column({ type: 'text' })
    content_html!: string;

    @ApiProperty({ description: 'Moderation status', enum: COMMENT_STATUSES })
    @Column({ type: 'varchar', length: 16, default: 'pending' })
    status!: CommentStatus;

    // bigint 由 pg 以字符串返回
    @Column({ type: 'bigint', nullable: true })
    moderation_message_id!: string | null;

    @ApiProperty({ description: 'Creation timestamp' })
    @CreateDateColumn({ type: 'timestamptz' })
    created_at!: Date;
}
