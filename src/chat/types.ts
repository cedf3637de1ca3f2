export interface ChatResponse {
  text?: string;
  cards?: Card[];
}

export interface Card {
  header?: CardHeader;
  sections: CardSection[];
}

export interface CardHeader {
  title: string;
  subtitle?: string;
}

export interface CardSection {
  widgets: CardWidget[];
}

export type CardWidget =
  | { textParagraph: TextParagraph }
  | { buttonList: ButtonList }
  | { divider: Divider }
  | { textInput: TextInput };

export interface TextParagraph {
  text: string;
}

export interface ButtonList {
  buttons: Button[];
}

export interface Button {
  textButton: TextButton;
}

export interface TextButton {
  text: string;
  onClick: OnClick;
}

export interface OnClick {
  action: CardAction;
}

export interface CardAction {
  actionMethodName: string;
  parameters: Record<string, string>;
}

export type Divider = Record<string, never>;

export interface TextInput {
  name: string;
  label: string;
  type: 'SINGLE_LINE' | 'MULTIPLE_LINE';
  value?: string;
  onChangeAction?: OnClick;
}
