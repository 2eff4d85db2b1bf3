/**
 * Message Keys
 * Opaque identifiers carried by failures and envelopes. Clients localize on
 * the key; `MESSAGE_TEXT` only supplies the default English text.
 */
export enum MessageKey {
    Success = 'Success',
    Created = 'Created',
    Forbidden = 'Forbidden',
    Unauthorized = 'Unauthorized',
    NotFound = 'NotFound',
    ValidationError = 'ValidationError',
    InternalServerError = 'InternalServerError',
    RequestCannotBeNull = 'RequestCannotBeNull',
    MalformedRequestBody = 'MalformedRequestBody',
    PayloadTooLarge = 'PayloadTooLarge',
    NameCannotBeEmpty = 'NameCannotBeEmpty',
    NameTooLong = 'NameTooLong',
    SlugCannotBeEmpty = 'SlugCannotBeEmpty',
    SlugInvalidFormat = 'SlugInvalidFormat',
    SlugTooLong = 'SlugTooLong',
    SummaryTooLong = 'SummaryTooLong',
    ProblemTooLong = 'ProblemTooLong',
    SolutionTooLong = 'SolutionTooLong',
    CategoryIdInvalid = 'CategoryIdInvalid',
    IdInvalid = 'IdInvalid',
    PatternSlugTaken = 'PatternSlugTaken',
    RouteNotFound = 'RouteNotFound',
}

export const MESSAGE_TEXT: Readonly<Record<MessageKey, string>> = {
    [MessageKey.Success]: 'Success.',
    [MessageKey.Created]: 'Created.',
    [MessageKey.Forbidden]: 'You do not have permission to perform this action.',
    [MessageKey.Unauthorized]: 'You are not authorized to access this resource.',
    [MessageKey.NotFound]: 'The requested resource does not exist.',
    [MessageKey.ValidationError]: 'The submitted data is invalid.',
    [MessageKey.InternalServerError]: 'An unexpected error occurred. Please try again later.',
    [MessageKey.RequestCannotBeNull]: 'The request cannot be empty.',
    [MessageKey.MalformedRequestBody]: 'The request body is not valid JSON.',
    [MessageKey.PayloadTooLarge]: 'The request body is too large.',
    [MessageKey.NameCannotBeEmpty]: 'Name cannot be empty.',
    [MessageKey.NameTooLong]: 'Name must be at most 120 characters.',
    [MessageKey.SlugCannotBeEmpty]: 'Slug cannot be empty.',
    [MessageKey.SlugInvalidFormat]: 'Slug may only contain lowercase letters, digits and single hyphens.',
    [MessageKey.SlugTooLong]: 'Slug must be at most 120 characters.',
    [MessageKey.SummaryTooLong]: 'Summary must be at most 500 characters.',
    [MessageKey.ProblemTooLong]: 'Problem must be at most 4000 characters.',
    [MessageKey.SolutionTooLong]: 'Solution must be at most 4000 characters.',
    [MessageKey.CategoryIdInvalid]: 'Category id must be a valid UUID.',
    [MessageKey.IdInvalid]: 'Id must be a valid UUID.',
    [MessageKey.PatternSlugTaken]: 'Another pattern already uses this slug.',
    [MessageKey.RouteNotFound]: 'No route matches this request.',
};

export function describeMessage(key: MessageKey): string {
    return MESSAGE_TEXT[key];
}
