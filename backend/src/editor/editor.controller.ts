import { Body, Controller, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { AddExpenseDto, AddRevenueDto, FindSongQueryDto, UpdateSongDto } from './dto';
import { EditorService } from './editor.service';

@Controller('editor')
export class EditorController {
  constructor(private readonly editorService: EditorService) {}

  @Get('summary')
  summary() {
    return this.editorService.summary();
  }

  @Get('songs')
  findByTitle(@Query() query: FindSongQueryDto) {
    return this.editorService.findByTitle(query.title);
  }

  @Get('songs/:songId')
  findById(@Param('songId') songId: string) {
    return this.editorService.findById(songId);
  }

  @Patch('songs/:songId')
  update(@Param('songId') songId: string, @Body() dto: UpdateSongDto) {
    return this.editorService.updateSong(songId, dto);
  }

  @Post('songs/:songId/expenses')
  addExpense(@Param('songId') songId: string, @Body() dto: AddExpenseDto) {
    return this.editorService.addExpense(songId, dto);
  }

  @Post('songs/:songId/revenue')
  addRevenue(@Param('songId') songId: string, @Body() dto: AddRevenueDto) {
    return this.editorService.addRevenue(songId, dto);
  }
}
