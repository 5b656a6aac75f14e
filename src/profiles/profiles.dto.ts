import { IsEmail, IsString, Length } from 'class-validator';

export class CreateProfileDto {
  @IsString()
  @Length(2, 100)
  name!: string;

  @IsEmail()
  email!: string;
}

export type AttachmentView = {
  id: string;
  filename: string | null;
  mimeType: string | null;
  size: number | null;
  url: string;
  width?: number;
  height?: number;
};

export type ProfileView = {
  id: string;
  name: string;
  email: string;
  avatar: AttachmentView | null;
  documents: AttachmentView[];
  createdAt?: Date;
  updatedAt?: Date;
};
