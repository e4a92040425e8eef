import { Module } from '@nestjs/common';
import { TodosModule } from '../todos/todos.module';
import { NotesModule } from '../notes/notes.module';
import { PreferencesModule } from '../preferences/preferences.module';
import { RecipesModule } from '../recipes/recipes.module';
import { AccountsModule } from '../accounts/accounts.module';
import { McpController } from './mcp.controller';
import { McpService } from './mcp.service';
import { ToolInvoker } from './tool.invoker';
import { ToolArgsValidator } from './tool-args.validator';
import { TodoTools } from './tools/todo.tools';
import { NoteTools } from './tools/notes.tools';
import { PreferenceTools } from './tools/preferences.tools';
import { RecipeTools } from './tools/recipes.tools';
import { AccountTools } from './tools/accounts.tools';

@Module({
  imports: [
    TodosModule,
    NotesModule,
    PreferencesModule,
    RecipesModule,
    AccountsModule,
  ],
  controllers: [McpController],
  providers: [
    McpService,
    ToolInvoker,
    ToolArgsValidator,
    TodoTools,
    NoteTools,
    PreferenceTools,
    RecipeTools,
    AccountTools,
  ],
})
export class McpModule {}
