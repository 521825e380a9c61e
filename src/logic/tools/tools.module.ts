import { Module } from '@nestjs/common';
import { HttpToolProvider } from './http-tool.provider';
import { ToolGatewayService } from './tool-gateway.service';
import { TOOL_PROVIDER } from './types';

@Module({
  providers: [
    { provide: TOOL_PROVIDER, useClass: HttpToolProvider },
    ToolGatewayService,
  ],
  exports: [ToolGatewayService],
})
export class ToolsModule {}
