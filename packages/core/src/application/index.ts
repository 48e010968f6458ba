export {
  type EmailAddress,
  type SendMessageInput,
  type SendMessageOutput,
  SendMessageUseCase,
  type SendMessageUseCaseOptions,
} from './usecases/sendMessageUseCase';
