export enum FilterOperator {
    // universal
    Equals = 'Equals',
    NotEquals = 'NotEquals',
    IsEmpty = 'IsEmpty',
    IsNotEmpty = 'IsNotEmpty',

    // text
    Contains = 'Contains',
    NotContains = 'NotContains',
    StartsWith = 'StartsWith',
    EndsWith = 'EndsWith',

    // number / date ordering
    GreaterThan = 'GreaterThan',
    LessThan = 'LessThan',
    GreaterOrEqual = 'GreaterOrEqual',
    LessOrEqual = 'LessOrEqual',
    Between = 'Between',

    // relative date windows: value = amount, valueEnd = InLastPeriod
    InLast = 'InLast',
    InNext = 'InNext',

    // set membership
    In = 'In',
    NotIn = 'NotIn',

    // boolean
    IsTrue = 'IsTrue',
    IsFalse = 'IsFalse',

    // date preset: value = DatePreset
    DateIs = 'DateIs',
    DateIsNot = 'DateIsNot',
}

export enum LogicalOperator {
    And = 'And',
    Or = 'Or',
}
