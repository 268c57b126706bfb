import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CommandRegistry } from './command-registry';
import { RunCommandDto } from './dto/run-command.dto';

@ApiTags('Commands')
@Controller('commands')
export class CommandsController {
  constructor(private readonly registry: CommandRegistry) {}

  /**
   * GET /commands
   */
  @Get()
  @ApiOperation({ summary: 'List available commands' })
  list() {
    return this.registry.list();
  }

  /**
   * POST /commands/:name
   * Body: { "args": { ... } }
   */
  @Post(':name')
  @HttpCode(200)
  @ApiOperation({ summary: 'Run a command' })
  @ApiResponse({ status: 200, description: 'Command result' })
  @ApiResponse({ status: 400, description: 'Invalid arguments' })
  @ApiResponse({ status: 404, description: 'Unknown command' })
  run(@Param('name') name: string, @Body() body: RunCommandDto) {
    return this.registry.dispatch(name, body.args ?? {});
  }
}
