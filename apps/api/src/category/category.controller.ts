import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags
} from '@nestjs/swagger';

import { CategoryService } from './category.service';
import { CategoryDto, CategoryResponseDto, CreateCategoryDto } from './dto';
import { ParseCategoryIdPipe } from './parse-category-id.pipe';

@ApiTags('Category')
@Controller('categories')
export class CategoryController {
  constructor(private readonly category: CategoryService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Create Category',
    description: 'Create a category with a unique name.'
  })
  @ApiCreatedResponse({ description: 'Category created.', type: CategoryDto })
  @ApiBadRequestResponse({ description: 'Request body failed validation.' })
  @ApiConflictResponse({ description: 'A category with this name already exists.' })
  createCategory(@Body() dto: CreateCategoryDto): Promise<CategoryDto> {
    return this.category.createCategory(dto);
  }

  @Get()
  @ApiOperation({
    summary: 'Get All Categories',
    description: 'Retrieve every category, ordered by name.'
  })
  @ApiOkResponse({
    description: 'List of categories retrieved successfully.',
    type: CategoryResponseDto,
    isArray: true
  })
  getCategories(): Promise<CategoryResponseDto[]> {
    return this.category.getCategories();
  }

  @Get(':id')
  @ApiOperation({
    summary: 'Get Category by ID',
    description: 'Retrieve a specific category using its numeric id.'
  })
  @ApiParam({
    name: 'id',
    required: true,
    description: 'The id of the category to retrieve.',
    type: Number,
    example: 1
  })
  @ApiOkResponse({
    description: 'Category retrieved successfully.',
    type: CategoryResponseDto
  })
  @ApiBadRequestResponse({ description: 'The id is not an integer.' })
  @ApiNotFoundResponse({ description: 'Category not found with the provided ID.' })
  getCategoryById(@Param('id', ParseCategoryIdPipe) id: number): Promise<CategoryResponseDto> {
    return this.category.getCategoryById(id);
  }
}
