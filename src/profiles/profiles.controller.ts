// src/profiles/profiles.controller.ts
import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  PayloadTooLargeException,
  Post,
  Put,
  Req,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import '@fastify/multipart'; // request.file() typings

import { errorCode } from '../attachments/errors';
import { UploadIo } from '../attachments/upload-io';
import { CreateProfileDto, ProfileView } from './profiles.dto';
import { ProfilesService } from './profiles.service';

@Controller('profiles')
export class ProfilesController {
  constructor(private readonly profiles: ProfilesService) {}

  @Post()
  async create(@Body() dto: CreateProfileDto): Promise<{ ok: true; profile: ProfileView }> {
    const doc = await this.profiles.create(dto);
    return { ok: true, profile: await this.profiles.present(doc) };
  }

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<{ ok: true; profile: ProfileView }> {
    const doc = await this.profiles.findOne(id);
    return { ok: true, profile: await this.profiles.present(doc) };
  }

  @Put(':id/avatar')
  async setAvatar(@Param('id') id: string, @Req() req: FastifyRequest): Promise<{ ok: true; profile: ProfileView }> {
    const io = await this.readUpload(req);
    try {
      const doc = await this.profiles.setAvatar(id, io);
      return { ok: true, profile: await this.profiles.present(doc) };
    } finally {
      await io.dispose();
    }
  }

  @Delete(':id/avatar')
  async removeAvatar(@Param('id') id: string): Promise<{ ok: true; profile: ProfileView }> {
    const doc = await this.profiles.removeAvatar(id);
    return { ok: true, profile: await this.profiles.present(doc) };
  }

  @Post(':id/documents')
  async addDocument(@Param('id') id: string, @Req() req: FastifyRequest): Promise<{ ok: true; profile: ProfileView }> {
    const io = await this.readUpload(req);
    try {
      const doc = await this.profiles.addDocument(id, io);
      return { ok: true, profile: await this.profiles.present(doc) };
    } finally {
      await io.dispose();
    }
  }

  // fileId is the stored id, URL-encoded (it contains slashes)
  @Delete(':id/documents/:fileId')
  async removeDocument(
    @Param('id') id: string,
    @Param('fileId') fileId: string,
  ): Promise<{ ok: true; profile: ProfileView }> {
    const doc = await this.profiles.removeDocument(id, fileId);
    return { ok: true, profile: await this.profiles.present(doc) };
  }

  @Delete(':id')
  @HttpCode(200)
  async remove(@Param('id') id: string): Promise<{ ok: true }> {
    await this.profiles.remove(id);
    return { ok: true };
  }

  /** Spools the single multipart file part so it can be analyzed and stored. */
  private async readUpload(req: FastifyRequest): Promise<UploadIo> {
    if (!req.isMultipart()) throw new BadRequestException('Expected multipart/form-data');
    const part = await req.file();
    if (!part) throw new BadRequestException('No file provided');

    try {
      return await UploadIo.fromStream(part.file, { filename: part.filename, contentType: part.mimetype });
    } catch (err) {
      if (errorCode(err) === 'FST_REQ_FILE_TOO_LARGE') throw new PayloadTooLargeException('File too large');
      throw err;
    }
  }
}
